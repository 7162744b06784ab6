/**
 * Extracts the readable message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Reduces a phone number or WhatsApp address ("77001234567@c.us") to its digits
 */
export function normalizePhone(address: string): string {
  return address.split('@')[0].replace(/[^\d]/g, '');
}

/**
 * Truncates text for log output
 */
export function preview(text: string, maxLength: number = 80): string {
  return text.length > maxLength ? `${text.substring(0, maxLength)}...` : text;
}

export type LeadField = 'name' | 'company' | 'phone' | 'task';

export type LeadFields = Record<LeadField, string>;

export type PartialLead = Partial<LeadFields>;

export type LeadStatus = 'new' | 'contacted' | 'closed';

export interface LeadRecord extends LeadFields {
  id: string;
  recordedAt: string;
  status: LeadStatus;
}

/**
 * Leads keyed by sender address, in insertion order
 */
export type LeadCollection = Record<string, LeadRecord>;

export interface LeadEntry {
  sender: string;
  record: LeadRecord;
}

export interface LeadListResult {
  success: boolean;
  leads: LeadEntry[];
  error?: string;
}

/**
 * Durable keyed store; read-all and write-all only, no partial updates
 */
export interface LeadRepository {
  readAll(): Promise<LeadCollection>;
  writeAll(leads: LeadCollection): Promise<void>;
}

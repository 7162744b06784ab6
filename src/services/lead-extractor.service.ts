import { LEAD_FORMAT_HINT } from '../constants/replies';
import { LeadField, LeadFields, PartialLead } from '../types';

interface FieldDefinition {
  field: LeadField;
  displayName: string;
  labels: string[];
}

/**
 * Required fields in the order they are asked for
 */
const FIELDS: FieldDefinition[] = [
  { field: 'name', displayName: 'Имя', labels: ['имя', 'name'] },
  { field: 'company', displayName: 'Компания', labels: ['компания', 'company'] },
  { field: 'phone', displayName: 'Телефон', labels: ['телефон', 'phone'] },
  { field: 'task', displayName: 'Задача', labels: ['задача', 'task'] },
];

// Optional "(hint)" between a label and its colon, as in "Задача (что автоматизировать):"
const HINT = '(?:\\s*\\([^)]*\\))?';

// A label must not be the tail of a longer word ("Username:" is not "Name:")
const WORD_START = '(?<![\\p{L}\\p{N}])';

const LINE_PATTERNS = FIELDS.map(definition => {
  const label = `(?:${definition.labels.join('|')})${HINT}\\s*:(.*)$`;
  return {
    field: definition.field,
    leading: new RegExp(`^[^\\p{L}\\p{N}]*${label}`, 'iu'),
    inline: new RegExp(`${WORD_START}${label}`, 'iu')
  };
});

const SECONDARY_TASK_PATTERN = /(?:нужен\s+)?(?:бот\s+для|bot\s+for)\s*:(.*)$/iu;

const MARKER_PATTERN = new RegExp(
  `${WORD_START}(?:${FIELDS.flatMap(definition => definition.labels).join('|')})${HINT}\\s*:|бот\\s+для\\s*:|bot\\s+for\\s*:`,
  'iu'
);

/**
 * A label opening the line wins; otherwise the leftmost label inside the line, as in
 * "Меня зовут Анна, телефон: 8700..."
 */
function matchLabelledLine(line: string): { field: LeadField; value: string } | null {
  for (const { field, leading } of LINE_PATTERNS) {
    const match = leading.exec(line);
    if (match) {
      return { field, value: match[1].trim() };
    }
  }

  let best: { field: LeadField; value: string; index: number } | null = null;
  for (const { field, inline } of LINE_PATTERNS) {
    const match = inline.exec(line);
    if (match && (!best || match.index < best.index)) {
      best = { field, value: match[1].trim(), index: match.index };
    }
  }
  return best && { field: best.field, value: best.value };
}

/**
 * Parses labelled lead lines ("Имя: ...", "Company: ...") and builds the replies of the intake flow
 */
export class LeadExtractorService {
  /**
   * True when the text carries any lead field label
   */
  public static hasLeadMarker(text: string): boolean {
    return MARKER_PATTERN.test(text);
  }

  public static extract(text: string): PartialLead {
    const lead: PartialLead = {};

    for (const rawLine of text.split('\n')) {
      const match = matchLabelledLine(rawLine.trim());
      if (match && match.value) {
        lead[match.field] = match.value;
      }
    }

    if (!lead.task) {
      for (const rawLine of text.split('\n')) {
        const match = SECONDARY_TASK_PATTERN.exec(rawLine.trim());
        const value = match ? match[1].trim() : '';
        if (value) {
          lead.task = value;
          break;
        }
      }
    }

    return lead;
  }

  /**
   * Display names of the required fields still missing, in asking order
   */
  public static missingFields(lead: PartialLead): string[] {
    return FIELDS
      .filter(definition => !lead[definition.field])
      .map(definition => definition.displayName);
  }

  public static isComplete(lead: PartialLead): lead is LeadFields {
    return this.missingFields(lead).length === 0;
  }

  public static buildFollowUp(missing: string[]): string {
    return `Почти всё! Не хватает: ${missing.join(', ')}.\n` +
      'Пришлите одним сообщением в формате:\n' +
      LEAD_FORMAT_HINT;
  }

  public static buildConfirmation(lead: LeadFields): string {
    return '✅ Записал вас на бесплатную консультацию!\n\n' +
      `👤 Имя: ${lead.name}\n` +
      `🏢 Компания: ${lead.company}\n` +
      `📱 Телефон: ${lead.phone}\n` +
      `🧩 Задача: ${lead.task}\n\n` +
      'Скоро свяжемся с вами. Вам удобнее звонок или WhatsApp? 🙂';
  }
}

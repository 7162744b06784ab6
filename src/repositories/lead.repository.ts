import { promises as fs } from 'fs';
import path from 'path';
import Joi from 'joi';
import { v4 as uuidv4 } from 'uuid';
import { LeadCollection, LeadRecord, LeadRepository, LeadStatus } from '../types';
import logger from '../utils/logger';

/**
 * A record as found on disk. Files written by the earlier bot carry `bot_type` and
 * `recorded_at` instead of `task` and `recordedAt`, and no id.
 */
interface StoredLeadRecord {
  id?: string;
  name?: string;
  company?: string;
  phone?: string;
  task?: string;
  bot_type?: string;
  recordedAt?: string;
  recorded_at?: string;
  status?: LeadStatus;
}

const storedRecordSchema = Joi.object<StoredLeadRecord>({
  id: Joi.string(),
  name: Joi.string().allow(''),
  company: Joi.string().allow(''),
  phone: Joi.string().allow(''),
  task: Joi.string().allow(''),
  bot_type: Joi.string().allow(''),
  recordedAt: Joi.string().isoDate(),
  recorded_at: Joi.string().isoDate(),
  status: Joi.string().valid('new', 'contacted', 'closed')
})
  .or('recordedAt', 'recorded_at')
  .unknown(true);

function toLeadRecord(stored: StoredLeadRecord): LeadRecord {
  return {
    id: stored.id ?? uuidv4(),
    name: stored.name ?? '',
    company: stored.company ?? '',
    phone: stored.phone ?? '',
    task: stored.task ?? stored.bot_type ?? '',
    recordedAt: stored.recordedAt ?? stored.recorded_at ?? '',
    status: stored.status ?? 'new'
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Lead collection kept as a single pretty-printed JSON object keyed by sender
 */
export class JsonFileLeadRepository implements LeadRepository {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async readAll(): Promise<LeadCollection> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }

    if (!raw.trim()) {
      return {};
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isPlainObject(parsed)) {
      throw new Error(`Invalid lead file ${this.filePath}: expected an object keyed by sender`);
    }

    const leads: LeadCollection = {};
    for (const [sender, candidate] of Object.entries(parsed)) {
      const { error, value } = storedRecordSchema.validate(candidate, { convert: false });
      if (error) {
        logger.warn('Skipping unreadable lead record', { sender, reason: error.message });
        continue;
      }
      leads[sender] = toLeadRecord(value);
    }
    return leads;
  }

  async writeAll(leads: LeadCollection): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    // Write-then-rename so a crash never leaves a truncated file behind
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, `${JSON.stringify(leads, null, 2)}\n`, 'utf-8');
    await fs.rename(tempPath, this.filePath);
  }
}


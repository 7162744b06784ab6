import { v4 as uuidv4 } from 'uuid';
import { LeadCollection, LeadFields, LeadListResult, LeadRecord, LeadRepository } from '../types';
import logger from '../utils/logger';
import { errorMessage } from '../utils/helpers';

/**
 * Persists completed leads keyed by sender address; the last save for a sender wins
 */
export class LeadStoreService {
  constructor(
    private readonly repository: LeadRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Read-modify-write of the whole collection. Safe only with a single poller.
   */
  async save(sender: string, fields: LeadFields): Promise<boolean> {
    try {
      const leads = await this.repository.readAll();

      const record: LeadRecord = {
        id: uuidv4(),
        name: fields.name,
        company: fields.company,
        phone: fields.phone,
        task: fields.task,
        recordedAt: this.now().toISOString(),
        status: 'new'
      };

      // Re-inserting moves the sender to the end so listings stay newest-last
      const updated: LeadCollection = { ...leads };
      delete updated[sender];
      updated[sender] = record;

      await this.repository.writeAll(updated);

      logger.info('Lead saved', {
        sender,
        leadId: record.id,
        name: record.name,
        replaced: sender in leads
      });

      return true;
    } catch (error) {
      logger.error('Error saving lead', {
        error: errorMessage(error),
        sender
      });
      return false;
    }
  }

  /**
   * The `limit` most recently saved leads, oldest of them first
   */
  async listRecent(limit: number): Promise<LeadListResult> {
    try {
      const leads = await this.repository.readAll();
      const entries = Object.entries(leads).map(([sender, record]) => ({ sender, record }));

      return {
        success: true,
        leads: limit > 0 ? entries.slice(-limit) : []
      };
    } catch (error) {
      logger.error('Error reading leads', { error: errorMessage(error) });

      return {
        success: false,
        leads: [],
        error: errorMessage(error)
      };
    }
  }
}

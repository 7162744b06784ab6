import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { LeadStoreService } from '../src/services/lead-store.service';
import { JsonFileLeadRepository } from '../src/repositories/lead.repository';
import { LeadFields } from '../src/types';
import { InMemoryLeadRepository } from './helpers/fakes';

const FIXED_NOW = new Date('2026-01-15T10:00:00.000Z');

const ANN: LeadFields = { name: 'Ann', company: 'Acme', phone: '123', task: 'bot' };

function lead(name: string): LeadFields {
  return { name, company: `${name} Co`, phone: '100', task: 'support bot' };
}

describe('LeadStoreService', () => {
  let repository: InMemoryLeadRepository;
  let store: LeadStoreService;

  beforeEach(() => {
    repository = new InMemoryLeadRepository();
    store = new LeadStoreService(repository, () => FIXED_NOW);
  });

  describe('save', () => {
    it('stores the lead under the sender with a timestamp and "new" status', async () => {
      await expect(store.save('77001112233@c.us', ANN)).resolves.toBe(true);

      expect(repository.writes).toBe(1);
      expect(repository.leads['77001112233@c.us']).toEqual({
        id: expect.any(String),
        name: 'Ann',
        company: 'Acme',
        phone: '123',
        task: 'bot',
        recordedAt: '2026-01-15T10:00:00.000Z',
        status: 'new'
      });
    });

    it('replaces the previous record of the same sender and moves it last', async () => {
      await store.save('a@c.us', lead('First'));
      await store.save('b@c.us', lead('Second'));
      await store.save('a@c.us', lead('Updated'));

      expect(Object.keys(repository.leads)).toEqual(['b@c.us', 'a@c.us']);
      expect(repository.leads['a@c.us'].name).toBe('Updated');
    });

    it('reports failure when the repository cannot write', async () => {
      repository.failWrites = true;

      await expect(store.save('a@c.us', ANN)).resolves.toBe(false);
      expect(repository.leads).toEqual({});
    });
  });

  describe('listRecent', () => {
    it('returns the last saved leads, oldest of them first', async () => {
      for (const name of ['One', 'Two', 'Three', 'Four']) {
        await store.save(`${name.toLowerCase()}@c.us`, lead(name));
      }

      const result = await store.listRecent(3);

      expect(result.success).toBe(true);
      expect(result.leads.map(entry => entry.sender)).toEqual(['two@c.us', 'three@c.us', 'four@c.us']);
      expect(result.leads[2].record.name).toBe('Four');
    });

    it('reports failure when the repository cannot read', async () => {
      repository.failReads = true;

      await expect(store.listRecent(3)).resolves.toEqual({
        success: false,
        leads: [],
        error: 'disk unavailable'
      });
    });
  });
});

describe('JsonFileLeadRepository', () => {
  let directory: string;
  let filePath: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'leads-'));
    filePath = path.join(directory, 'nested', 'client_records.json');
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('treats a missing file as an empty collection', async () => {
    await expect(new JsonFileLeadRepository(filePath).readAll()).resolves.toEqual({});
  });

  it('writes pretty JSON that reads back the same', async () => {
    const repository = new JsonFileLeadRepository(filePath);
    const leads = {
      '77001112233@c.us': {
        id: 'lead-1',
        ...ANN,
        recordedAt: '2026-01-15T10:00:00.000Z',
        status: 'new' as const
      }
    };

    await repository.writeAll(leads);

    await expect(repository.readAll()).resolves.toEqual(leads);
    const raw = await fs.readFile(filePath, 'utf-8');
    expect(raw.startsWith('{\n  "77001112233@c.us": {\n    "id": "lead-1",')).toBe(true);
  });

  it('keeps non-Latin text as written', async () => {
    const repository = new JsonFileLeadRepository(filePath);
    await repository.writeAll({
      key: { id: 'lead-2', name: 'Айгерим', company: 'ТОО Ромашка', phone: '1', task: 'бот', recordedAt: '2026-01-15T10:00:00.000Z', status: 'new' }
    });

    const raw = await fs.readFile(filePath, 'utf-8');
    expect(raw).toContain('"name": "Айгерим"');
  });

  async function writeRaw(contents: unknown): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(contents), 'utf-8');
  }

  it('rejects a file that is not an object keyed by sender', async () => {
    await writeRaw([{ name: 'Ann' }]);

    await expect(new JsonFileLeadRepository(filePath).readAll()).rejects.toThrow(/^Invalid lead file/);
  });

  it('reads records written by the earlier bot', async () => {
    await writeRaw({
      '77001@c.us': {
        name: 'Ann',
        company: 'Acme',
        phone: '87001234567',
        bot_type: 'запись клиентов',
        recorded_at: '2025-11-02T14:05:09.123456',
        status: 'new'
      }
    });

    await expect(new JsonFileLeadRepository(filePath).readAll()).resolves.toEqual({
      '77001@c.us': {
        id: expect.any(String),
        name: 'Ann',
        company: 'Acme',
        phone: '87001234567',
        task: 'запись клиентов',
        recordedAt: '2025-11-02T14:05:09.123456',
        status: 'new'
      }
    });
  });

  it('skips unreadable records and keeps the rest', async () => {
    const good = { id: 'lead-1', ...ANN, recordedAt: '2026-01-15T10:00:00.000Z', status: 'new' };
    await writeRaw({ someone: { name: 42 }, '77001112233@c.us': good });

    await expect(new JsonFileLeadRepository(filePath).readAll()).resolves.toEqual({ '77001112233@c.us': good });
  });

  it('keeps saving and listing on top of an earlier file', async () => {
    await writeRaw({
      'old@c.us': { name: 'Old', company: 'Co', phone: '1', bot_type: 'crm', recorded_at: '2025-11-02T14:05:09', status: 'new' }
    });
    const fileStore = new LeadStoreService(new JsonFileLeadRepository(filePath), () => FIXED_NOW);

    await expect(fileStore.save('new@c.us', ANN)).resolves.toBe(true);

    const result = await fileStore.listRecent(3);
    expect(result.success).toBe(true);
    expect(result.leads.map(entry => [entry.sender, entry.record.task])).toEqual([
      ['old@c.us', 'crm'],
      ['new@c.us', 'bot']
    ]);
  });

  it('treats an empty file as an empty collection', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '', 'utf-8');

    await expect(new JsonFileLeadRepository(filePath).readAll()).resolves.toEqual({});
  });
});

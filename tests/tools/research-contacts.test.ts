import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ResearchContactsTool, fieldGains, tierChangesBetween } from '../../src/tools/research-contacts.js';
import { SourceRegistry } from '../../src/sources/registry.js';
import { SeedDatabaseSource } from '../../src/sources/seed-database.js';
import { OrganizationStore } from '../../src/store/organization-store.js';
import type { Logger } from '../../src/utils/logger.js';
import { BrokenSource, FakeSource } from '../fixtures/adapters.js';
import { buildOrganizations, silentLogger } from '../fixtures/organizations.js';

const DATASET = [
  'Name,Phone/Mobile,Email,Address/Location',
  'Alpha School,0712 345 678,a@alpha.ac.tz,Sinza',
  'Beta Academy,0754 111 222,,Mwenge',
  'Gamma School,0688 123 456,,',
  'Delta Primary School,,,Kinondoni',
  'Epsilon College,,,',
].join('\n');

const DEFAULTS = { location: 'Dar es Salaam, Tanzania', useSeedDatabase: false };

describe('ResearchContactsTool', () => {
  let dir: string;
  let file: string;
  let logger: Logger;
  let store: OrganizationStore;
  let directory: FakeSource;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'research-'));
    file = join(dir, 'schools.csv');
    writeFileSync(file, DATASET);
    logger = silentLogger();
    store = new OrganizationStore(logger);
    directory = new FakeSource('yellowpages', (query) => {
      if (query.name === 'Beta Academy') {
        return [{ name: 'Beta Academy', email: 'info@beta.ac.tz', source: 'yellowpages' }];
      }
      if (query.name === 'Gamma School') {
        return [{ name: 'Completely Different Org', phone: '0767 000 111', source: 'yellowpages' }];
      }
      return [];
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should fill a missing email and promote exactly that organization', async () => {
    const tool = new ResearchContactsTool(
      new SourceRegistry([directory], ['yellowpages']),
      store,
      DEFAULTS,
      logger
    );

    const result = await tool.execute({ file });

    expect(result.researched).toBe(4);
    expect(result.matched).toBe(1);
    expect(result.gains).toEqual({ phones: 0, emails: 1, addresses: 0, websites: 0 });
    expect(result.tier_changes).toEqual([{ name: 'Beta Academy', from: 'B', to: 'A' }]);
    expect(result.sources).toEqual([{ source: 'yellowpages', records: 2, skipped: 0, failed: false }]);
    expect(result.stats).toMatchObject({ total: 5, tier_a: 2, tier_b: 1, tier_c: 2 });
    expect(store.get('Beta Academy')?.emails).toEqual(['info@beta.ac.tz']);
    expect(store.get('Gamma School')?.phones).toEqual(['+255 68 812 3456']);
  });

  it('should look organizations up by name near their address', async () => {
    const tool = new ResearchContactsTool(
      new SourceRegistry([directory], ['yellowpages']),
      store,
      DEFAULTS,
      logger
    );

    await tool.execute({ file, limit_per_source: 3 });

    expect(directory.queries.map((query) => [query.name, query.location, query.limit])).toEqual([
      ['Beta Academy', 'Mwenge', 3],
      ['Gamma School', 'Dar es Salaam, Tanzania', 3],
      ['Delta Primary School', 'Kinondoni', 3],
      ['Epsilon College', 'Dar es Salaam, Tanzania', 3],
    ]);
  });

  it('should change nothing when run again with the same sources', async () => {
    const tool = new ResearchContactsTool(
      new SourceRegistry([directory], ['yellowpages']),
      store,
      DEFAULTS,
      logger
    );
    await tool.execute({ file });
    const before = store.list();

    const second = await tool.execute({});

    expect(second.researched).toBe(3);
    expect(second.matched).toBe(0);
    expect(second.gains).toEqual({ phones: 0, emails: 0, addresses: 0, websites: 0 });
    expect(second.tier_changes).toEqual([]);
    expect(store.list()).toEqual(before);
  });

  it('should consult the seed database by name when opted in', async () => {
    const seed = new SeedDatabaseSource(logger, [
      { key: 'gamma school', name: 'Gamma School', email: 'info@gamma.ac.tz', address: 'Ubungo' },
    ]);
    const tool = new ResearchContactsTool(new SourceRegistry([seed], []), store, DEFAULTS, logger);

    const result = await tool.execute({ file, use_seed_database: true });

    expect(result.matched).toBe(1);
    expect(result.gains).toEqual({ phones: 0, emails: 1, addresses: 1, websites: 0 });
    expect(result.tier_changes).toEqual([{ name: 'Gamma School', from: 'B', to: 'A' }]);
    expect(result.sources).toEqual([{ source: 'seed_database', records: 1, skipped: 0, failed: false }]);
    expect(store.get('Gamma School')).toMatchObject({
      emails: ['info@gamma.ac.tz'],
      address: 'Ubungo',
      website_status: 'no_website',
      sources: ['dataset', 'seed_database'],
      notes: [],
    });
  });

  it('should record a failing source and still finish', async () => {
    const tool = new ResearchContactsTool(
      new SourceRegistry([new BrokenSource('brela', 'registry offline'), directory], ['brela', 'yellowpages']),
      store,
      DEFAULTS,
      logger
    );

    const result = await tool.execute({ file });

    expect(result.sources).toEqual([
      { source: 'brela', records: 0, skipped: 0, failed: true, error: 'registry offline' },
      { source: 'yellowpages', records: 2, skipped: 0, failed: false },
    ]);
    expect(result.matched).toBe(1);
  });
});

describe('fieldGains and tierChangesBetween', () => {
  it('should count fields that went from absent to present', () => {
    const before = buildOrganizations([
      { raw: { name: 'Kariakoo Shop', phone: '0712 345 678', source: 'dataset' }, type: 'retail' },
    ]);
    const after = buildOrganizations([
      {
        raw: {
          name: 'Kariakoo Shop',
          phone: '0712 345 678; 0754 111 222',
          email: 'shop@kariakoo.co.tz',
          address: 'Kariakoo',
          website: 'https://kariakoo.co.tz',
          source: 'dataset',
        },
        type: 'retail',
      },
    ]);

    expect(fieldGains(before, after)).toEqual({ phones: 0, emails: 1, addresses: 1, websites: 1 });
    expect(tierChangesBetween(before, after)).toEqual([{ name: 'Kariakoo Shop', from: 'B', to: 'A' }]);
  });
});

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SeedDatabaseSource, type SeedEntry } from '../../src/sources/seed-database.js';
import { collect } from '../../src/sources/types.js';
import { Logger } from '../../src/utils/logger.js';

const ENTRIES: SeedEntry[] = [
  {
    key: 'tusiime schools',
    name: 'Tusiime Schools',
    phone: '+255 754 123456',
    email: 'info@tusiimeschools.ac.tz',
    address: 'Mlimani, Dar es Salaam',
  },
  { key: 'feza schools', name: 'Feza Schools', phone: '+255 713 456789' },
  { key: 'green acres', name: 'Green Acres Academy' },
];

describe('SeedDatabaseSource', () => {
  let source: SeedDatabaseSource;

  beforeEach(() => {
    const logger = new Logger('test');
    logger.setEmitter(vi.fn());
    source = new SeedDatabaseSource(logger, ENTRIES);
  });

  it('should load the bundled school table', () => {
    const entries = SeedDatabaseSource.loadEntries();

    expect(entries).toHaveLength(58);
    expect(entries[0].name).toBe('Tusiime Schools');
  });

  describe('lookup', () => {
    it('should match the key exactly, ignoring case', () => {
      expect(source.lookup('Tusiime Schools')?.name).toBe('Tusiime Schools');
    });

    it('should match when one name contains the other', () => {
      expect(source.lookup('Feza Schools Msasani')?.name).toBe('Feza Schools');
      expect(source.lookup('Green')?.name).toBe('Green Acres Academy');
    });

    it('should match on two shared words', () => {
      expect(source.lookup('Tusiime Primary Schools')?.name).toBe('Tusiime Schools');
    });

    it('should return null when nothing matches', () => {
      expect(source.lookup('Azania Secondary')).toBeNull();
      expect(source.lookup('   ')).toBeNull();
    });
  });

  describe('search', () => {
    it('should yield the named entry as a school without a website', async () => {
      const { records, report } = await collect(source, {
        type: 'school',
        location: 'Dar es Salaam',
        keywords: [],
        limit: 1,
        name: 'tusiime schools',
      });

      expect(records).toEqual([
        {
          name: 'Tusiime Schools',
          phone: '+255 754 123456',
          email: 'info@tusiimeschools.ac.tz',
          address: 'Mlimani, Dar es Salaam',
          website_status: 'no_website',
          type: 'school',
          source: 'seed_database',
        },
      ]);
      expect(report.records).toBe(1);
    });

    it('should list entries up to the limit when browsing', async () => {
      const { records } = await collect(source, {
        type: 'school',
        location: 'Dar es Salaam',
        keywords: [],
        limit: 2,
      });

      expect(records.map((record) => record.name)).toEqual(['Tusiime Schools', 'Feza Schools']);
    });

    it('should yield nothing for other organization types', async () => {
      const { records } = await collect(source, {
        type: 'business',
        location: 'Dar es Salaam',
        keywords: [],
        limit: 10,
      });

      expect(records).toEqual([]);
    });
  });
});

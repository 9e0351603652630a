import type { SourceAdapter } from '../../src/sources/types.js';
import { emptyReport } from '../../src/sources/types.js';
import type { WebsiteLookup } from '../../src/sources/website-finder.js';
import type {
  AdapterSourceId,
  OrganizationType,
  RawRecord,
  SearchQuery,
  SourceRunReport,
} from '../../src/types/organization.js';

/**
 * In-process source answering each query from a callback
 */
export class FakeSource implements SourceAdapter {
  readonly id: AdapterSourceId;
  readonly label: string;
  readonly queries: SearchQuery[] = [];
  private respond: (query: SearchQuery) => RawRecord[];

  constructor(id: AdapterSourceId, respond: (query: SearchQuery) => RawRecord[]) {
    this.id = id;
    this.label = `Fake ${id}`;
    this.respond = respond;
  }

  supports(_type: OrganizationType): boolean {
    return true;
  }

  async *search(
    query: SearchQuery,
    report: SourceRunReport = emptyReport(this.id)
  ): AsyncGenerator<RawRecord> {
    this.queries.push(query);
    for (const record of this.respond(query)) {
      report.records++;
      yield record;
    }
  }
}

/**
 * Source whose search always throws
 */
export class BrokenSource implements SourceAdapter {
  readonly id: AdapterSourceId;
  readonly label = 'Broken source';
  private message: string;

  constructor(id: AdapterSourceId, message: string) {
    this.id = id;
    this.message = message;
  }

  supports(): boolean {
    return true;
  }

  async *search(): AsyncGenerator<RawRecord> {
    throw new Error(this.message);
  }
}

/**
 * Website lookup answering from a fixed name-to-URL table
 */
export class FakeWebsiteLookup implements WebsiteLookup {
  readonly calls: [string, string][] = [];
  private websites: Record<string, string>;

  constructor(websites: Record<string, string>) {
    this.websites = websites;
  }

  async findWebsite(name: string, location: string): Promise<string | undefined> {
    this.calls.push([name, location]);
    return this.websites[name];
  }
}

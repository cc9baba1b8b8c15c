import type { DatabaseClient } from '../db/client.js';
import { getDb } from '../db/client.js';
import type { ExtractionMetadata, MetadataStore } from '../collaborators/types.js';
import type { Target } from '../core/types.js';
import { ExtractionRepository } from './extractionRepository.js';
import { TargetRepository } from './targetRepository.js';

/** MetadataStore backed by the target and extraction tables. */
export class SqliteMetadataStore implements MetadataStore {
  readonly targets: TargetRepository;
  readonly extractions: ExtractionRepository;

  constructor(db: DatabaseClient = getDb()) {
    this.targets = new TargetRepository(db);
    this.extractions = new ExtractionRepository(db);
  }

  async upsertTarget(target: Target, requiresCookies?: boolean): Promise<void> {
    await this.targets.upsert(target, requiresCookies);
  }

  async recordExtraction(meta: ExtractionMetadata): Promise<void> {
    await this.extractions.record(meta);
  }
}

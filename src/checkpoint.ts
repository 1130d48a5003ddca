/**
 * Incremental checkpointing of the in-progress search result.
 */

import { type ExportContext, buildExport, writeJsonAtomic } from "./export.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { SearchResult } from "./types.js";

/** Records collected between two checkpoints */
export const CHECKPOINT_INTERVAL = 5;

export interface Checkpointer {
  save(result: SearchResult): Promise<void>;
}

/**
 * Overwrites one file with the export of the current result.
 * Writing the same state twice produces the same file.
 */
export class IncrementalCheckpointer implements Checkpointer {
  private readonly logger: Logger;

  constructor(
    readonly path: string,
    private readonly context: ExportContext,
    logger: Logger = silentLogger()
  ) {
    this.logger = logger.child({ component: "checkpoint" });
  }

  async save(result: SearchResult): Promise<void> {
    await writeJsonAtomic(this.path, buildExport(result, this.context));
    this.logger.info({ path: this.path, papers: result.papers.length }, `Saved ${result.papers.length} papers`);
  }
}

import path from "path";
import chokidar, { type FSWatcher } from "chokidar";
import { logLine } from "../agent/log.js";
import { getErrorMessage } from "../lib/errors.js";
import type { EmbeddingRetriever } from "../retrieval/embeddingRetriever.js";
import {
  isKnowledgeFile,
  loadKnowledgeDocuments,
  readKnowledgeFile,
  toKnowledgeId,
  type KnowledgeDocument,
} from "./loader.js";

export interface KnowledgeEntry {
  id: string;
  title: string;
  contentHash: string;
}

export interface SyncSummary {
  added: number;
  updated: number;
  removed: number;
  unchanged: number;
}

/**
 * Keeps a retriever's vector store in step with a knowledge folder. Documents are re-embedded
 * only when their content hash changes. Syncs, single-file updates and removals run one at a time
 * in call order, so a removal never races an embedding that is still in flight.
 */
export class KnowledgeBase {
  private readonly entries = new Map<string, KnowledgeEntry>();
  private watcher: FSWatcher | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly retriever: EmbeddingRetriever,
    readonly dir: string
  ) {}

  sync(): Promise<SyncSummary> {
    return this.enqueue(async () => {
      const summary: SyncSummary = { added: 0, updated: 0, removed: 0, unchanged: 0 };
      const docs = await loadKnowledgeDocuments(this.dir);
      const seen = new Set<string>();

      for (const doc of docs) {
        seen.add(doc.id);
        const outcome = await this.upsert(doc);
        summary[outcome]++;
      }
      for (const id of [...this.entries.keys()]) {
        if (!seen.has(id)) {
          this.remove(id);
          summary.removed++;
        }
      }

      logLine(
        `Knowledge synced: ${summary.added} added, ${summary.updated} updated, ${summary.removed} removed, ${summary.unchanged} unchanged`
      );
      return summary;
    });
  }

  /** Re-read a single file after it was added or changed on disk. */
  syncFile(fullPath: string): Promise<void> {
    return this.enqueue(async () => {
      const doc = await readKnowledgeFile(this.dir, fullPath);
      if (!doc) {
        this.removeById(toKnowledgeId(this.dir, fullPath));
        return;
      }
      const outcome = await this.upsert(doc);
      if (outcome !== "unchanged") logLine(`Knowledge file ${outcome}: ${doc.id}`);
    });
  }

  removeFile(fullPath: string): Promise<void> {
    return this.enqueue(async () => {
      this.removeById(toKnowledgeId(this.dir, fullPath));
    });
  }

  /** Start watching the folder; resolves once the initial scan is done and later changes will be seen. */
  async watch(): Promise<void> {
    if (this.watcher) return;
    const watcher = chokidar.watch(this.dir, {
      ignored: /(^|[/\\])\../,
      persistent: true,
      ignoreInitial: true,
    });
    this.watcher = watcher;

    const report = (fullPath: string) => (err: unknown) => {
      logLine(`Could not re-index ${path.basename(fullPath)}: ${getErrorMessage(err)}`);
    };
    const onChange = (fullPath: string) => {
      if (!isKnowledgeFile(fullPath)) return;
      this.syncFile(fullPath).catch(report(fullPath));
    };
    watcher.on("add", onChange);
    watcher.on("change", onChange);
    watcher.on("unlink", (fullPath: string) => {
      this.removeFile(fullPath).catch(report(fullPath));
    });

    await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
    logLine(`Watching knowledge folder: ${this.dir}`);
  }

  async close(): Promise<void> {
    const watcher = this.watcher;
    if (!watcher) return;
    this.watcher = null;
    await watcher.close();
    logLine("Stopped watching knowledge folder");
  }

  list(): KnowledgeEntry[] {
    return [...this.entries.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  size(): number {
    return this.entries.size;
  }

  private enqueue<T>(job: () => Promise<T>): Promise<T> {
    const run = this.queue.then(job);
    // A failed job rejects its own caller; the next job still runs.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async upsert(doc: KnowledgeDocument): Promise<"added" | "updated" | "unchanged"> {
    const previous = this.entries.get(doc.id);
    if (previous && previous.contentHash === doc.contentHash) return "unchanged";
    await this.retriever.embedDocument(doc.text, doc.id);
    this.entries.set(doc.id, { id: doc.id, title: doc.title, contentHash: doc.contentHash });
    return previous ? "updated" : "added";
  }

  private removeById(id: string): void {
    if (this.remove(id)) logLine(`Knowledge file removed: ${id}`);
  }

  private remove(id: string): boolean {
    if (!this.entries.delete(id)) return false;
    this.retriever.removeDocument(id);
    return true;
  }
}

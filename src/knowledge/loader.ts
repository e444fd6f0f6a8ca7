import { createHash } from "crypto";
import { readFile, readdir } from "fs/promises";
import path from "path";
import matter from "gray-matter";
import { logLine } from "../agent/log.js";
import { extractText, isExtractable } from "../extract/office.js";
import { getErrorMessage } from "../lib/errors.js";

export interface KnowledgeDocument {
  /** Path relative to the knowledge folder, with forward slashes. */
  id: string;
  title: string;
  text: string;
  contentHash: string;
}

const HIDDEN = /(^|[/\\])\./;
/** Read as UTF-8; markdown additionally has its frontmatter parsed. */
const TEXT_EXTENSIONS = new Set([".md", ".markdown", ".txt"]);

/** SHA-256 of the text, used to skip re-embedding unchanged files. */
export function computeContentHash(content: string | Buffer): string {
  const data = typeof content === "string" ? Buffer.from(content, "utf-8") : content;
  return createHash("sha256").update(data).digest("hex");
}

export function toKnowledgeId(dir: string, fullPath: string): string {
  return path.relative(dir, fullPath).split(path.sep).join("/");
}

export function isKnowledgeFile(fullPath: string): boolean {
  if (HIDDEN.test(path.basename(fullPath))) return false;
  const ext = path.extname(fullPath).toLowerCase();
  return TEXT_EXTENSIONS.has(ext) || isExtractable(ext);
}

/**
 * Markdown frontmatter is dropped from the text; its `title` (or the file name) becomes a heading
 * so the model can tell which document a passage came from.
 */
function markdownToText(raw: string, fallbackTitle: string): { title: string; text: string } {
  const parsed = matter(raw);
  const fmTitle: unknown = parsed.data.title;
  const title = typeof fmTitle === "string" && fmTitle.trim() ? fmTitle.trim() : fallbackTitle;
  const body = parsed.content.trim();
  return { title, text: body ? `# ${title}\n\n${body}` : "" };
}

/**
 * Read one knowledge file. Returns null for unsupported or empty files; read errors propagate.
 */
export async function readKnowledgeFile(dir: string, fullPath: string): Promise<KnowledgeDocument | null> {
  if (!isKnowledgeFile(fullPath)) return null;
  const ext = path.extname(fullPath).toLowerCase();
  const id = toKnowledgeId(dir, fullPath);
  const baseName = path.basename(fullPath, path.extname(fullPath));
  const buffer = await readFile(fullPath);

  let title = baseName;
  let text: string;
  if (isExtractable(ext)) {
    text = (await extractText(buffer)) ?? "";
  } else if (ext === ".md" || ext === ".markdown") {
    ({ title, text } = markdownToText(buffer.toString("utf-8"), baseName));
  } else {
    text = buffer.toString("utf-8").trim();
  }
  if (!text) return null;
  return { id, title, text, contentHash: computeContentHash(text) };
}

/**
 * Load every supported file under `dir` (recursively, skipping dotfiles), sorted by id.
 * A missing folder yields no documents; unreadable files are logged and skipped.
 */
export async function loadKnowledgeDocuments(dir: string): Promise<KnowledgeDocument[]> {
  const out: KnowledgeDocument[] = [];

  async function walk(current: string): Promise<void> {
    let entries;
    try {
      entries = await readdir(current, { withFileTypes: true });
    } catch (err) {
      if (current === dir) {
        logLine(`Knowledge folder not readable: ${dir} (${getErrorMessage(err)})`);
        return;
      }
      throw err;
    }
    for (const e of entries) {
      if (e.name.startsWith(".")) continue;
      const full = path.join(current, e.name);
      if (e.isDirectory()) {
        await walk(full);
      } else if (e.isFile() && isKnowledgeFile(full)) {
        try {
          const doc = await readKnowledgeFile(dir, full);
          if (doc) out.push(doc);
        } catch (err) {
          logLine(`Skipping knowledge file ${toKnowledgeId(dir, full)}: ${getErrorMessage(err)}`);
        }
      }
    }
  }

  await walk(dir);
  return out.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

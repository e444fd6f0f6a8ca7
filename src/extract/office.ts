/**
 * Extract plain text from PDF, Word, PowerPoint, Excel and OpenDocument files so they can be embedded as knowledge.
 */
import officeParser from "officeparser";

const OFFICE_EXTENSIONS = new Set([".pdf", ".docx", ".pptx", ".xlsx", ".odt", ".odp", ".ods"]);

/** Whether a knowledge file with this extension goes through office text extraction. */
export function isExtractable(ext: string): boolean {
  return OFFICE_EXTENSIONS.has(ext.toLowerCase());
}

/**
 * Returns plain text from the document buffer, or null when nothing could be extracted.
 */
export async function extractText(buffer: Buffer): Promise<string | null> {
  const text = await officeParser.parseOfficeAsync(buffer);
  return text.trim() || null;
}

import fs from 'node:fs/promises';

export type SourceReadResult = { ok: true; content: string } | { ok: false; error: string };

// A leading byte-order mark stays in the text so whole-file rewrites keep it.
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Read a source file as strict UTF-8.
 * Missing files, permission problems and invalid byte sequences come back as
 * `{ ok: false }` so callers can skip the file and carry on.
 */
export async function readSourceFile(filePath: string): Promise<SourceReadResult> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
  try {
    return { ok: true, content: decoder.decode(bytes) };
  } catch {
    return { ok: false, error: 'not valid UTF-8' };
  }
}


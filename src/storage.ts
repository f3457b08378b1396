import fs from "node:fs";
import path from "node:path";

export class StorageError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}

export type LoadedDocument = { content: string; isNew: boolean };

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Read a document; a missing file is a new, empty one. */
export function readDocument(filePath: string): LoadedDocument {
  if (!fs.existsSync(filePath)) return { content: "", isNew: true };
  try {
    const data = fs.readFileSync(filePath, "utf8");
    return { content: data.replace(/\r\n/g, "\n"), isNew: false };
  } catch (error) {
    const message = `Could not read ${filePath}: ${describe(error)}`;
    throw new StorageError(message, filePath, { cause: error });
  }
}

export function writeDocument(filePath: string, content: string) {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, "utf8");
  } catch (error) {
    const message = `Could not write ${filePath}: ${describe(error)}`;
    throw new StorageError(message, filePath, { cause: error });
  }
}

import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { ToolSpec } from "@switchboard/types";
import { defineTool } from "./define-tool.js";

export const SaveDocumentSchema = z.object({
  name: z.string().min(1).describe("Document name, e.g. 'apollo/plan.md'"),
  content: z.string().describe("Full document content"),
});

export const ReadDocumentSchema = z.object({
  name: z.string().min(1).describe("Name of the document to read"),
});

export const ListDocumentsSchema = z.object({
  prefix: z.string().optional().describe("Only list documents under this folder"),
});

export class DocumentNotFoundError extends Error {
  readonly documentName: string;

  constructor(documentName: string, options?: { cause?: unknown }) {
    super(`Document not found: ${documentName}`, options);
    this.name = "DocumentNotFoundError";
    this.documentName = documentName;
  }
}

export interface DocumentEntry {
  name: string;
  size: number;
}

/**
 * Plain-text documents kept under a workspace directory. Names are relative
 * paths and may not leave the workspace.
 */
export class DocumentStore {
  private readonly root: string;

  constructor(workspaceDir: string) {
    this.root = path.resolve(workspaceDir);
  }

  private resolveName(name: string): string {
    const resolved = path.resolve(this.root, name);
    const relative = path.relative(this.root, resolved);
    if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new Error(`Access denied: ${name} is outside the document workspace`);
    }
    return resolved;
  }

  async save(params: z.infer<typeof SaveDocumentSchema>): Promise<string> {
    const file = this.resolveName(params.name);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, params.content, "utf8");
    return `Saved ${params.name} (${Buffer.byteLength(params.content, "utf8")} bytes)`;
  }

  async read(params: z.infer<typeof ReadDocumentSchema>): Promise<string> {
    const file = this.resolveName(params.name);
    try {
      return await fs.readFile(file, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        throw new DocumentNotFoundError(params.name, { cause: err });
      }
      throw err;
    }
  }

  async list(params: z.infer<typeof ListDocumentsSchema> = {}): Promise<DocumentEntry[]> {
    const start = params.prefix ? this.resolveName(params.prefix) : this.root;
    const entries: DocumentEntry[] = [];
    await this.walk(start, entries);
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }

  private async walk(dir: string, into: DocumentEntry[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(full, into);
      } else if (entry.isFile()) {
        const stat = await fs.stat(full);
        into.push({
          name: path.relative(this.root, full).split(path.sep).join("/"),
          size: stat.size,
        });
      }
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** The save/read/list tools over one document store. */
export function documentTools(store: DocumentStore): ToolSpec[] {
  return [
    defineTool({
      name: "save_document",
      description: "Save a text document (for example a plan or a list of user stories) to the workspace.",
      argumentSchema: SaveDocumentSchema,
      handler: (args) => store.save(args),
    }),
    defineTool({
      name: "read_document",
      description: "Read a document previously saved to the workspace.",
      argumentSchema: ReadDocumentSchema,
      handler: (args) => store.read(args),
    }),
    defineTool({
      name: "list_documents",
      description: "List the documents saved in the workspace.",
      argumentSchema: ListDocumentsSchema,
      handler: async (args) => {
        const entries = await store.list(args);
        if (entries.length === 0) return "No documents saved yet.";
        return entries.map((e) => `${e.name} (${e.size} bytes)`).join("\n");
      },
    }),
  ];
}

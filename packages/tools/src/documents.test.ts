import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { asSessionId, type ToolSpec } from "@switchboard/types";
import { DocumentStore, documentTools } from "./documents.js";

const ctx = {
  sessionId: asSessionId("s-1"),
  topic: "planning",
  callId: "call-1",
  signal: new AbortController().signal,
};

function run(tools: ToolSpec[], name: string, args: unknown): Promise<string> {
  const tool = tools.find((t) => t.name === name);
  if (!tool || tool.isDelegate) throw new Error(`no action tool ${name}`);
  return tool.handler(tool.argumentSchema.parse(args), ctx);
}

describe("DocumentStore", () => {
  let dir: string;
  let store: DocumentStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "switchboard-docs-"));
    store = new DocumentStore(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("saves and reads documents in nested folders", async () => {
    await expect(store.save({ name: "apollo/plan.md", content: "# Plan" })).resolves.toBe(
      "Saved apollo/plan.md (6 bytes)",
    );
    await expect(store.read({ name: "apollo/plan.md" })).resolves.toBe("# Plan");
    expect(fs.readFileSync(path.join(dir, "apollo", "plan.md"), "utf8")).toBe("# Plan");
  });

  it("lists documents sorted by name", async () => {
    await store.save({ name: "b.md", content: "bb" });
    await store.save({ name: "a/c.md", content: "c" });

    await expect(store.list()).resolves.toEqual([
      { name: "a/c.md", size: 1 },
      { name: "b.md", size: 2 },
    ]);
    await expect(store.list({ prefix: "a" })).resolves.toEqual([{ name: "a/c.md", size: 1 }]);
  });

  it("lists nothing when the workspace does not exist yet", async () => {
    const empty = new DocumentStore(path.join(dir, "missing"));
    await expect(empty.list()).resolves.toEqual([]);
  });

  it("refuses names outside the workspace", async () => {
    await expect(store.save({ name: "../escape.md", content: "x" })).rejects.toThrow(
      "Access denied: ../escape.md is outside the document workspace",
    );
    await expect(store.read({ name: "/etc/passwd" })).rejects.toThrow("Access denied");
  });

  it("reports missing documents", async () => {
    await expect(store.read({ name: "nope.md" })).rejects.toThrow("Document not found: nope.md");
  });

  it("exposes save, read and list as tools", async () => {
    const tools = documentTools(store);
    expect(tools.map((t) => t.name)).toEqual(["save_document", "read_document", "list_documents"]);

    await expect(run(tools, "list_documents", {})).resolves.toBe("No documents saved yet.");
    await run(tools, "save_document", { name: "notes.md", content: "hello" });
    await expect(run(tools, "read_document", { name: "notes.md" })).resolves.toBe("hello");
    await expect(run(tools, "list_documents", {})).resolves.toBe("notes.md (5 bytes)");
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile, mkdir, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createServer } from "../src/server.ts";
import { Vault } from "../src/vault/index.ts";

let vaultDir: string;
let server: McpServer;
let client: Client;

beforeEach(async () => {
  vaultDir = await mkdtemp(join(tmpdir(), "folio-tools-"));
  server = createServer(new Vault(vaultDir));
  client = new Client({ name: "test-client", version: "1.0.0" });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);
});

afterEach(async () => {
  await client.close();
  await server.close();
  await rm(vaultDir, { recursive: true });
});

async function createFile(path: string, content: string): Promise<void> {
  const full = join(vaultDir, path);
  await mkdir(join(full, ".."), { recursive: true });
  await writeFile(full, content, "utf-8");
}

async function call(name: string, args: Record<string, unknown> = {}): Promise<{ text: string; isError: boolean }> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  return { text: first?.type === "text" ? first.text : "", isError: result.isError ?? false };
}

describe("tool registration", () => {
  it("exposes every vault tool", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual([
      "append-to-section",
      "daily",
      "delete",
      "edit",
      "get-properties",
      "list",
      "properties",
      "read",
      "related",
      "replace",
      "search",
      "template",
      "templates",
      "write",
    ]);
  });

  it("documents the ordering limit of integer-like property keys", async () => {
    const { tools } = await client.listTools();

    for (const name of ["write", "properties"]) {
      const tool = tools.find((t) => t.name === name);
      expect(JSON.stringify(tool?.inputSchema)).toContain("Integer-like keys");
    }
  });
});

describe("reading tools", () => {
  it("lists a directory", async () => {
    await createFile("note.md", "hello");
    await mkdir(join(vaultDir, "projects"));

    expect(await call("list")).toEqual({ text: "📄 note.md (5 B)\n📁 projects", isError: false });
  });

  it("reports an empty directory", async () => {
    expect((await call("list", { path: "nowhere" })).text).toBe("Empty directory");
  });

  it("reads a note with its frontmatter", async () => {
    await createFile("plan.md", "---\nstatus: active\n---\n\n# Plan\n");

    const { text } = await call("read", { path: "plan" });

    expect(text).toBe("**Frontmatter:**\n```yaml\nstatus: active\n```\n\n# Plan\n");
  });

  it("returns vault errors as tool errors", async () => {
    const result = await call("read", { path: "missing" });

    expect(result.isError).toBe(true);
    expect(result.text).toContain("Note not found: missing.md");
  });

  it("searches filenames and content", async () => {
    await createFile("notes/meeting.md", "agenda");

    expect((await call("search", { query: "meeting" })).text).toBe(
      "**notes/meeting.md**\n  Filename match: notes/meeting.md"
    );
    expect((await call("search", { query: "zzz" })).text).toBe('No results for "zzz"');
  });

  it("lists related notes with the reason", async () => {
    await createFile("source.md", "---\ntags: [work]\n---\n\n[[Alpha]]");
    await createFile("Alpha.md", "---\ntags: [work]\n---\n");

    expect((await call("related", { path: "source" })).text).toBe("**Alpha.md** (linked; tags: work)");
    expect((await call("related", { path: "Alpha", on: ["links"] })).text).toBe("No related notes for Alpha");
  });

  it("reads properties", async () => {
    await createFile("a.md", "plain");
    expect((await call("get-properties", { path: "a" })).text).toBe("No properties");
  });
});

describe("editing tools", () => {
  it("writes a note with frontmatter", async () => {
    const result = await call("write", { path: "new", content: "Body", frontmatter: { status: "draft" } });

    expect(result.text).toBe("Wrote: new.md");
    expect(await readFile(join(vaultDir, "new.md"), "utf-8")).toBe("---\nstatus: draft\n---\n\nBody");
  });

  it("replaces text", async () => {
    await createFile("a.md", "foo bar foo");

    expect((await call("replace", { path: "a", find: "foo", replace: "X", replace_all: false })).text).toBe(
      "Replaced in: a.md"
    );
    expect(await readFile(join(vaultDir, "a.md"), "utf-8")).toBe("X bar foo");
  });

  it("edits in insert mode", async () => {
    await createFile("a.md", "Line one\nLine two");

    await call("edit", { path: "a", mode: "insert-before", target: "Line two", content: "middle", newline_before: true });

    expect(await readFile(join(vaultDir, "a.md"), "utf-8")).toBe("Line one\nmiddle\nLine two");
  });

  it("requires the parameters of the chosen edit mode", async () => {
    await createFile("a.md", "## Log\n");

    const result = await call("edit", { path: "a", mode: "append-to-section", content: "x" });

    expect(result.isError).toBe(true);
    expect(result.text).toContain('"header" and "content" are required for mode "append-to-section"');
  });

  it("appends to a section", async () => {
    await createFile("a.md", "## Log\n- one\n\n## Next\n");

    const result = await call("append-to-section", { path: "a", section_header: "## Log", text: "- two" });

    expect(result.text).toBe("Appended to ## Log in: a.md");
    expect(await readFile(join(vaultDir, "a.md"), "utf-8")).toBe("## Log\n- one\n- two\n\n## Next\n");
  });

  it("reports a header level mismatch", async () => {
    await createFile("a.md", "## Log\n");

    const result = await call("append-to-section", { path: "a", section_header: "# Log", text: "x" });

    expect(result.isError).toBe(true);
    expect(result.text).toContain("Header level mismatch: looking for '# Log' but found '##' at line 1");
  });

  it("updates properties", async () => {
    await createFile("a.md", "---\ntitle: A\n---\n\nBody");

    await call("properties", { path: "a", properties: { status: "done" }, remove: ["title"] });

    expect(await readFile(join(vaultDir, "a.md"), "utf-8")).toBe("---\nstatus: done\n---\n\nBody");
  });

  it("creates a note from a template", async () => {
    await createFile("templates/t.md", "# {{title}} for {{who}}\n");

    expect((await call("templates")).text).toBe("📄 t.md (24 B)");
    expect((await call("template", { path: "Review", template_path: "t", variables: { who: "Sam" } })).text).toBe(
      "Created: Review.md"
    );
    expect(await readFile(join(vaultDir, "Review.md"), "utf-8")).toBe("# Review for Sam\n");
  });

  it("deletes a note", async () => {
    await createFile("a.md", "x");
    expect((await call("delete", { path: "a" })).text).toBe("Deleted: a.md");
  });
});

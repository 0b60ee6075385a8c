import { Command, CommanderError } from "commander";
import { loadConfigOrExit } from "../config.ts";
import { SERVER_VERSION } from "../server.ts";
import { Vault, VaultError, frontmatterToObject, stringifyFrontmatter } from "../vault/index.ts";
import type { Frontmatter, Note, RelationCriterion, SearchScope, WriteMode } from "../vault/index.ts";
import {
  collect,
  parseAssignments,
  parseCriterion,
  parseInteger,
  parseJsonObject,
  parseScope,
  parseVariables,
  parseWriteMode,
  resolveContent,
} from "./options.ts";

interface GlobalOptions {
  vault?: string;
  json?: boolean;
}

export interface ProgramIO {
  stdin?: AsyncIterable<unknown>;
}

/** Build the `folio` command tree. */
export function createProgram(io: ProgramIO = {}): Command {
  const program = new Command();

  // set before subcommands are added so they inherit it
  program
    .exitOverride()
    .name("folio")
    .description("Read and edit the markdown notes of a vault")
    .version(SERVER_VERSION, "-V, --version", "output the version number")
    .option("--vault <path>", "vault directory (default: FOLIO_VAULT)")
    .option("--json", "output in JSON format");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const content = (arg: string): Promise<string> => resolveContent(arg, io.stdin);

  function openVault(): Vault {
    const config = loadConfigOrExit("Pass --vault <path> or set FOLIO_VAULT", globals().vault);
    return new Vault(config.vaultPath, {
      dailyNotesPath: config.dailyNotesPath,
      templatesPath: config.templatesPath,
    });
  }

  function print(value: unknown, text: string): void {
    console.log(globals().json ? JSON.stringify(value, null, 2) : text);
  }

  function printNote(note: Note): void {
    const fm = stringifyFrontmatter(note.frontmatter);
    print(
      { path: note.path, frontmatter: frontmatterToObject(note.frontmatter), content: note.body },
      fm ? `---\n${fm}\n---\n\n${note.body}` : note.body
    );
  }

  program
    .command("list")
    .description("List files and folders in a vault directory")
    .argument("[path]", "directory relative to the vault root", ".")
    .option("-r, --recursive", "list markdown files in subdirectories too")
    .option("--limit <n>", "max entries", parseInteger, 50)
    .option("--offset <n>", "entries to skip", parseInteger, 0)
    .action(async (path: string, opts: { recursive?: boolean; limit: number; offset: number }) => {
      const entries = await openVault().list(path, opts);
      print(entries, entries.map((e) => `${e.isDirectory ? "dir " : "file"} ${e.path}`).join("\n"));
    });

  program
    .command("read")
    .description("Read a note")
    .argument("<path>", "note path (.md optional)")
    .action(async (path: string) => {
      printNote(await openVault().readNote(path));
    });

  program
    .command("delete")
    .description("Delete a note or folder")
    .argument("<path>", "note or folder path")
    .action(async (path: string) => {
      const deleted = await openVault().delete(path);
      print({ deleted }, `Deleted: ${deleted}`);
    });

  program
    .command("write")
    .description("Create or update a note")
    .argument("<path>", "note path (.md optional)")
    .requiredOption("--content <content>", "body text, @file, or - for stdin")
    .option("--frontmatter <json>", "frontmatter as a JSON object", parseJsonObject)
    .option("--mode <mode>", "overwrite | append | prepend", parseWriteMode, "overwrite")
    .action(async (path: string, opts: { content: string; frontmatter?: Frontmatter; mode: WriteMode }) => {
      const body = await content(opts.content);
      const written = await openVault().write(path, body, { frontmatter: opts.frontmatter, mode: opts.mode });
      print({ path: written }, `Wrote: ${written}`);
    });

  program
    .command("daily")
    .description("Read a daily note")
    .argument("[date]", "today, yesterday, tomorrow or YYYY-MM-DD", "today")
    .action(async (date: string) => {
      printNote(await openVault().dailyNote(date));
    });

  program
    .command("search")
    .description("Search notes for literal text")
    .argument("<query>", "case-sensitive literal text")
    .option("--scope <scope>", "content, filename or tags (repeatable)", parseScope)
    .option("--path-filter <prefix>", "only notes whose path starts with this prefix")
    .action(async (query: string, opts: { scope?: SearchScope[]; pathFilter?: string }) => {
      const results = await openVault().search({
        text: query,
        scope: opts.scope ?? ["content", "filename"],
        pathFilter: opts.pathFilter,
      });
      print(results, results.map((r) => `${r.path}\n  ${r.previews.join("\n  ")}`).join("\n"));
    });

  program
    .command("related")
    .description("Find notes related by tags or wikilinks")
    .argument("<path>", "source note")
    .option("--on <criterion>", "tags or links (repeatable)", parseCriterion)
    .action(async (path: string, opts: { on?: RelationCriterion[] }) => {
      const related = await openVault().related(path, opts.on ?? ["tags", "links"]);
      print(related, related.map((r) => r.path).join("\n"));
    });

  program
    .command("replace")
    .description("Replace literal text in a note body")
    .argument("<path>", "note path")
    .requiredOption("--find <text>", "literal text to find")
    .requiredOption("--replace <text>", "replacement (\\n becomes a newline)")
    .option("--first", "replace only the first occurrence")
    .action(async (path: string, opts: { find: string; replace: string; first?: boolean }) => {
      const edited = await openVault().replaceText(path, opts.find, opts.replace, !opts.first);
      print({ path: edited }, `Replaced in: ${edited}`);
    });

  program
    .command("insert")
    .description("Insert text next to the first occurrence of a literal anchor")
    .argument("<path>", "note path")
    .requiredOption("--target <text>", "literal anchor text")
    .requiredOption("--content <content>", "text to insert, @file, or - for stdin")
    .option("--before", "insert before the anchor instead of after it")
    .option("--newline", "keep the inserted text on its own line")
    .action(
      async (path: string, opts: { target: string; content: string; before?: boolean; newline?: boolean }) => {
        const edited = await openVault().edit(path, {
          mode: opts.before ? "insert-before" : "insert-after",
          target: opts.target,
          content: await content(opts.content),
          newlineBefore: opts.newline ?? false,
        });
        print({ path: edited }, `Edited: ${edited}`);
      }
    );

  program
    .command("append-to-section")
    .description("Append text to a markdown section")
    .argument("<path>", "note path")
    .requiredOption("--section <header>", "header with # markers, e.g. '## Log'")
    .requiredOption("--text <content>", "text to append, @file, or - for stdin")
    .action(async (path: string, opts: { section: string; text: string }) => {
      const edited = await openVault().appendToSection(path, opts.section, await content(opts.text));
      print({ path: edited }, `Appended to ${opts.section} in: ${edited}`);
    });

  program
    .command("properties")
    .description("Set or remove frontmatter properties")
    .argument("<path>", "note path")
    .option("--set <key=value>", "property to set, value parsed as JSON when possible (repeatable)", collect, [])
    .option("--remove <key>", "property to remove (repeatable)", collect, [])
    .action(async (path: string, opts: { set: string[]; remove: string[] }) => {
      const edited = await openVault().updateProperties(path, parseAssignments(opts.set), opts.remove);
      print({ path: edited }, `Updated properties: ${edited}`);
    });

  program
    .command("get-properties")
    .description("Print a note's frontmatter properties")
    .argument("<path>", "note path")
    .action(async (path: string) => {
      const frontmatter = await openVault().getProperties(path);
      print(frontmatterToObject(frontmatter), stringifyFrontmatter(frontmatter));
    });

  program
    .command("template")
    .description("Create a note from a template")
    .argument("<path>", "destination note path")
    .requiredOption("--template <path>", "template path")
    .option("--var <key=value>", "template variable (repeatable)", collect, [])
    .action(async (path: string, opts: { template: string; var: string[] }) => {
      const created = await openVault().createFromTemplate(path, opts.template, parseVariables(opts.var));
      print({ path: created }, `Created: ${created}`);
    });

  program
    .command("templates")
    .description("List templates")
    .action(async () => {
      const templates = await openVault().listTemplates();
      print(templates, templates.map((t) => t.path).join("\n"));
    });

  return program;
}

/** Run the CLI and return its exit code. */
export async function run(argv: string[], io: ProgramIO = {}): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (process.env.DEBUG || !(err instanceof VaultError)) {
      console.error(err);
    } else {
      console.error(`Error: ${err.message}`);
    }
    return 1;
  }
}

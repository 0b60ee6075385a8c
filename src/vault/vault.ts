import { readdir, readFile, stat, mkdir, writeFile, rm } from "node:fs/promises";
import { join, resolve, relative, basename, extname, dirname, sep } from "node:path";
import * as log from "../log.ts";
import { applyEdit } from "./edit.ts";
import {
  FrontmatterParseError,
  InvalidDateError,
  NoteExistsError,
  NoteNotFoundError,
  PathEscapeError,
} from "./errors.ts";
import { mergeFrontmatter, parseFrontmatter, parseNote, serializeNote } from "./frontmatter.ts";
import { findRelated } from "./relations.ts";
import { searchNotes } from "./search.ts";
import { formatDate, renderTemplate } from "./template.ts";
import type { TemplateVariables } from "./template.ts";
import type {
  EditOperation,
  Frontmatter,
  Note,
  RelatedNote,
  RelationCriterion,
  SearchQuery,
  SearchResult,
  VaultEntry,
  WriteMode,
} from "./types.ts";

export interface VaultOptions {
  /** Folder holding daily notes, relative to the vault root */
  dailyNotesPath?: string;
  /** Folder holding templates, relative to the vault root (default "templates") */
  templatesPath?: string;
}

export interface ListOptions {
  recursive?: boolean;
  limit?: number;
  offset?: number;
}

export interface WriteOptions {
  frontmatter?: Frontmatter;
  mode?: WriteMode;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/** Append `.md` unless the path already ends with it. */
export function ensureMdExtension(path: string): string {
  return path.endsWith(".md") ? path : `${path}.md`;
}

/** Resolve "today", "yesterday", "tomorrow" or YYYY-MM-DD to a local date. */
export function parseNoteDate(input: string, now: Date = new Date()): Date {
  const today = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  switch (input) {
    case "today":
      return today;
    case "yesterday":
      return new Date(today.getFullYear(), today.getMonth(), today.getDate() - 1);
    case "tomorrow":
      return new Date(today.getFullYear(), today.getMonth(), today.getDate() + 1);
  }

  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(input);
  if (!match) throw new InvalidDateError(input);
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new InvalidDateError(input);
  }
  return date;
}

export class Vault {
  private readonly locks = new Map<string, Promise<void>>();

  constructor(
    readonly root: string,
    private readonly options: VaultOptions = {}
  ) {}

  /** Resolve a user-supplied path and ensure it stays within the vault root. */
  private resolveSafe(userPath: string): string {
    const resolvedRoot = resolve(this.root);
    const resolvedPath = resolve(this.root, userPath.replace(/^\/+/, ""));
    if (resolvedPath !== resolvedRoot && !resolvedPath.startsWith(resolvedRoot + sep)) {
      throw new PathEscapeError(userPath);
    }
    return resolvedPath;
  }

  private relPath(fullPath: string): string {
    return relative(this.root, fullPath).split(sep).join("/");
  }

  /** Serialize read-modify-write cycles on one file. */
  private async withLock<T>(fullPath: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(fullPath) ?? Promise.resolve();
    const run = previous.then(fn);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(fullPath, settled);
    try {
      return await run;
    } finally {
      if (this.locks.get(fullPath) === settled) this.locks.delete(fullPath);
    }
  }

  private async readRaw(fullPath: string, displayPath: string): Promise<string> {
    try {
      return await readFile(fullPath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) throw new NoteNotFoundError(displayPath);
      throw err;
    }
  }

  private async exists(fullPath: string): Promise<boolean> {
    try {
      await stat(fullPath);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  /**
   * List a directory. Non-recursive listings return files and folders;
   * recursive ones return markdown files only. A missing directory is empty.
   */
  async list(dirPath = ".", options: ListOptions = {}): Promise<VaultEntry[]> {
    const { recursive = false, limit = 50, offset = 0 } = options;
    const fullPath = this.resolveSafe(dirPath);
    if (!(await this.exists(fullPath))) return [];

    let results: VaultEntry[];
    if (recursive) {
      const files: string[] = [];
      await this.collectMarkdownFiles(fullPath, files);
      results = await Promise.all(
        files.map(async (file) => ({
          path: this.relPath(file),
          name: basename(file, ".md"),
          isDirectory: false,
          size: (await stat(file)).size,
        }))
      );
    } else {
      const entries = await readdir(fullPath, { withFileTypes: true });
      results = [];
      for (const entry of entries) {
        if (entry.name.startsWith(".")) continue;

        const entryPath = join(fullPath, entry.name);
        results.push({
          path: this.relPath(entryPath),
          name: entry.isDirectory()
            ? entry.name
            : basename(entry.name, extname(entry.name)),
          isDirectory: entry.isDirectory(),
          size: entry.isDirectory() ? undefined : (await stat(entryPath)).size,
        });
      }
      results.sort((a, b) => a.path.localeCompare(b.path));
    }
    return results.slice(offset, offset + limit);
  }

  /** Read and parse a note. The `.md` extension is optional. */
  async readNote(notePath: string): Promise<Note> {
    const path = ensureMdExtension(notePath);
    const fullPath = this.resolveSafe(path);
    const raw = await this.readRaw(fullPath, path);
    return parseNote(this.relPath(fullPath), raw);
  }

  async getProperties(notePath: string): Promise<Frontmatter> {
    return (await this.readNote(notePath)).frontmatter;
  }

  /** Delete a note (tried with `.md` first) or a directory, recursively. */
  async delete(targetPath: string): Promise<string> {
    for (const candidate of [ensureMdExtension(targetPath), targetPath]) {
      const fullPath = this.resolveSafe(candidate);
      if (!(await this.exists(fullPath))) continue;

      const s = await stat(fullPath);
      await rm(fullPath, { recursive: s.isDirectory() });
      log.debug(`deleted ${candidate}`);
      return candidate;
    }
    throw new NoteNotFoundError(targetPath);
  }

  /**
   * Create or update a note. Overwrite replaces the whole file; append and
   * prepend join the content to the existing body and merge frontmatter.
   */
  async write(notePath: string, content: string, options: WriteOptions = {}): Promise<string> {
    const path = ensureMdExtension(notePath);
    const fullPath = this.resolveSafe(path);
    const { mode = "overwrite", frontmatter = new Map() } = options;

    return this.withLock(fullPath, async () => {
      let result = serializeNote(frontmatter, content);

      if (mode !== "overwrite" && (await this.exists(fullPath))) {
        const existing = parseNote(path, await this.readRaw(fullPath, path));
        const merged = mergeFrontmatter(existing.frontmatter, frontmatter);
        const body =
          mode === "append" ? `${existing.body}\n${content}` : `${content}\n${existing.body}`;
        result = serializeNote(merged, body);
      }

      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, result, "utf-8");
      return path;
    });
  }

  /** Find the daily note for a date in the usual daily-note folders. */
  async dailyNote(date = "today", now: Date = new Date()): Promise<Note> {
    const fileName = `${formatDate(parseNoteDate(date, now), "YYYY-MM-DD")}.md`;
    const folders = [this.options.dailyNotesPath, "", "daily", "Daily Notes"];

    for (const folder of folders) {
      if (folder === undefined) continue;
      const candidate = folder ? `${folder.replace(/\/+$/, "")}/${fileName}` : fileName;
      if (await this.exists(this.resolveSafe(candidate))) return this.readNote(candidate);
    }
    throw new NoteNotFoundError(`daily note ${fileName}`);
  }

  /**
   * Load every markdown note under a directory, in sorted path order. Notes
   * with unreadable frontmatter are skipped.
   */
  async notes(dirPath = "."): Promise<Note[]> {
    const files: string[] = [];
    await this.collectMarkdownFiles(this.resolveSafe(dirPath), files);

    const notes: Note[] = [];
    for (const file of files) {
      const path = this.relPath(file);
      try {
        notes.push(parseNote(path, await readFile(file, "utf-8")));
      } catch (err) {
        if (!(err instanceof FrontmatterParseError)) throw err;
        log.warn(`skipping ${path}: ${err.message}`);
      }
    }
    return notes;
  }

  /** Search the vault for literal text in the requested scopes. */
  async search(query: SearchQuery): Promise<SearchResult[]> {
    return searchNotes(await this.notes(), query);
  }

  /** Notes sharing tags with, or linked from, the note at path. */
  async related(
    notePath: string,
    criteria: RelationCriterion[] = ["tags", "links"]
  ): Promise<RelatedNote[]> {
    const source = await this.readNote(notePath);
    return findRelated(source, await this.notes(), criteria);
  }

  /** Apply an edit to a note body. Frontmatter text is left as written. */
  async edit(notePath: string, operation: EditOperation): Promise<string> {
    const path = ensureMdExtension(notePath);
    const fullPath = this.resolveSafe(path);

    return this.withLock(fullPath, async () => {
      const raw = await this.readRaw(fullPath, path);
      const { body } = parseFrontmatter(raw);
      const head = raw.slice(0, raw.length - body.length);
      await writeFile(fullPath, head + applyEdit(body, operation), "utf-8");
      return path;
    });
  }

  async replaceText(notePath: string, find: string, replace: string, replaceAll = true): Promise<string> {
    return this.edit(notePath, { mode: "replace", target: find, content: replace, replaceAll });
  }

  async appendToSection(notePath: string, header: string, text: string): Promise<string> {
    return this.edit(notePath, { mode: "append-to-section", header, text });
  }

  /** Set and remove frontmatter properties; the body is untouched. */
  async updateProperties(
    notePath: string,
    properties: Frontmatter,
    remove: string[] = []
  ): Promise<string> {
    const path = ensureMdExtension(notePath);
    const fullPath = this.resolveSafe(path);

    return this.withLock(fullPath, async () => {
      const note = parseNote(path, await this.readRaw(fullPath, path));
      const merged = mergeFrontmatter(note.frontmatter, properties, remove);
      await writeFile(fullPath, serializeNote(merged, note.body), "utf-8");
      return path;
    });
  }

  private templatesDir(): string {
    return this.options.templatesPath ?? "templates";
  }

  /**
   * Render a template into a new note. A template path starting with "/" is
   * relative to the vault root, otherwise to the templates folder.
   */
  async createFromTemplate(
    notePath: string,
    templatePath: string,
    variables: TemplateVariables = {},
    now: Date = new Date()
  ): Promise<string> {
    const path = ensureMdExtension(notePath);
    const fullPath = this.resolveSafe(path);
    const source = ensureMdExtension(
      templatePath.startsWith("/") ? templatePath.slice(1) : join(this.templatesDir(), templatePath)
    );
    const template = await this.readRaw(this.resolveSafe(source), source);

    return this.withLock(fullPath, async () => {
      if (await this.exists(fullPath)) throw new NoteExistsError(path);

      const rendered = renderTemplate(
        template,
        { title: basename(path, ".md"), ...variables },
        now
      );
      // fails on frontmatter the template rendered into invalid YAML
      parseFrontmatter(rendered);

      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, rendered, "utf-8");
      log.debug(`created ${path} from ${source}`);
      return path;
    });
  }

  /** Markdown templates directly inside the templates folder. */
  async listTemplates(): Promise<VaultEntry[]> {
    const dir = this.resolveSafe(this.templatesDir());
    if (!(await this.exists(dir))) return [];

    const entries = await readdir(dir, { withFileTypes: true });
    const templates: VaultEntry[] = [];
    for (const entry of entries) {
      if (!entry.isFile() || extname(entry.name) !== ".md") continue;
      templates.push({
        path: entry.name,
        name: basename(entry.name, ".md"),
        isDirectory: false,
        size: (await stat(join(dir, entry.name))).size,
      });
    }
    return templates.sort((a, b) => a.path.localeCompare(b.path));
  }

  private async collectMarkdownFiles(dirPath: string, files: string[]): Promise<void> {
    const entries = await readdir(dirPath, { withFileTypes: true }).catch((err: unknown) => {
      if (isNotFound(err)) return [];
      throw err;
    });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;
      const fullPath = join(dirPath, entry.name);

      if (entry.isDirectory()) {
        await this.collectMarkdownFiles(fullPath, files);
      } else if (extname(entry.name) === ".md") {
        files.push(fullPath);
      }
    }
  }
}

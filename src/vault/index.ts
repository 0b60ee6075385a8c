export { Vault, ensureMdExtension, parseNoteDate } from "./vault.ts";
export type { VaultOptions, ListOptions, WriteOptions } from "./vault.ts";
export * from "./errors.ts";
export * from "./frontmatter.ts";
export * from "./sections.ts";
export * from "./edit.ts";
export * from "./relations.ts";
export * from "./search.ts";
export * from "./template.ts";
export type * from "./types.ts";

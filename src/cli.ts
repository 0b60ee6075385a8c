/**
 * folio command-line client: the same vault operations as the MCP tools,
 * for scripts and shells.
 */

import { run } from "./cli/program.ts";

process.exitCode = await run(process.argv);

#!/usr/bin/env node
/**
 * nglog CLI — read ngLog files from the command line.
 *
 * Commands:
 *   parse <input>    Parse a local/world log → canonical text or JSON
 *   decode <input>   Undo world-variant XOR → raw bytes (or --hex)
 *   format <input>   JSON log → canonical text
 *
 * <input> is a file path or "-" for stdin. Output goes to stdout unless -o.
 */

import { Command, Option } from "commander";
import { loadConfig } from "./lib/config.js";
import { readInput, writeOutput } from "./lib/io.js";
import { parseCommand } from "./commands/parse.js";
import { decodeCommand } from "./commands/decode.js";
import { formatCommand } from "./commands/format.js";

const program = new Command();

program
  .name("nglog")
  .description("Decode, parse and re-serialize ngLog gameplay logs")
  .version("0.1.0");

// ── parse ───────────────────────────────────────────────────────────

program
  .command("parse")
  .description("Parse a log and print it as canonical text or JSON")
  .argument("<input>", "Log file, or - for stdin")
  .option("--variant <variant>", "local|world (default: $NGLOG_VARIANT or local)")
  .addOption(new Option("--world", "Shorthand for --variant world").conflicts("variant"))
  .option("--format <format>", "text|json (default: $NGLOG_FORMAT or text)")
  .option("-o, --output <file>", "Output file path")
  .action(async (input: string, opts: { variant?: string; world?: boolean; format?: string; output?: string }) => {
    const config = loadConfig(process.env, opts);
    const bytes = await readInput(input);
    await writeOutput(parseCommand(bytes, config), opts.output);
  });

// ── decode ──────────────────────────────────────────────────────────

program
  .command("decode")
  .description("Undo the world-variant XOR and write the decoded bytes")
  .argument("<input>", "World log file, or - for stdin")
  .option("--hex", "Print the decoded bytes as hex")
  .option("-o, --output <file>", "Output file path")
  .action(async (input: string, opts: { hex?: boolean; output?: string }) => {
    const bytes = await readInput(input);
    await writeOutput(decodeCommand(bytes, { hex: opts.hex }), opts.output);
  });

// ── format ──────────────────────────────────────────────────────────

program
  .command("format")
  .description("Validate a JSON log and print it as canonical text")
  .argument("<input>", "JSON file, or - for stdin")
  .option("-o, --output <file>", "Output file path")
  .action(async (input: string, opts: { output?: string }) => {
    const bytes = await readInput(input);
    await writeOutput(formatCommand(bytes), opts.output);
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`\nError: ${err.message}`);
  process.exit(1);
});

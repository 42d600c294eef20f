#!/usr/bin/env node

import { readFileSync, writeFileSync, existsSync } from "node:fs";
import { loadConfig } from "./config.js";
import { createPrivacyService, type PrivacyService } from "./service.js";
import { isPrivacyLevel } from "./privacy-levels.js";
import { TokenVeilError } from "./errors.js";
import type { PrivacyLevel } from "./types.js";

const VALUE_FLAGS = new Set(["--session", "--level", "-o", "--output", "--store", "--config", "--max-age"]);

function usage(): void {
  console.log(`
tokenveil - Replace personal data with session-stable tokens

Usage:
  tokenveil deidentify <file> [--session id] [--level l] [-o out]
  tokenveil deidentify --stdin [--session id]
  tokenveil reconstruct <file> --session <id> [-o out]
  tokenveil enhance <file> --session <id>
  tokenveil session create [--level l]
  tokenveil session show <id>
  tokenveil session delete <id>
  tokenveil session list [--max-age ms]

Options:
  --session <id>       Session to use (deidentify creates it when unknown)
  --level <level>      Privacy level: minimal, balanced (default) or strict
  --store <dir>        Session directory (default: $TOKENVEIL_STORAGE_PATH or .tokenveil)
  --config <file>      JSON configuration file
  -o, --output <file>  Write output to file instead of stdout
  --stdin              Read input from stdin
  -h, --help           Show this help
`);
}

class CliError extends Error {}

interface ParsedArgs {
  positionals: string[];
  values: Map<string, string>;
  switches: Set<string>;
}

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], values: new Map(), switches: new Set() };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined) throw new CliError(`Missing value for ${arg}`);
      parsed.values.set(arg === "-o" ? "--output" : arg, value);
      i++;
    } else if (arg.startsWith("-")) {
      parsed.switches.add(arg);
    } else {
      parsed.positionals.push(arg);
    }
  }
  return parsed;
}

function readInput(args: ParsedArgs, file: string | undefined): string {
  if (args.switches.has("--stdin")) return readFileSync(0, "utf-8");
  if (!file || !existsSync(file)) {
    throw new CliError(`File not found: ${file ?? "(none)"}`);
  }
  return readFileSync(file, "utf-8");
}

function writeOutput(args: ParsedArgs, text: string): void {
  const out = args.values.get("--output");
  if (out) {
    writeFileSync(out, text);
    console.error(`Wrote → ${out}`);
  } else {
    process.stdout.write(text);
  }
}

function levelOption(args: ParsedArgs): PrivacyLevel | undefined {
  const level = args.values.get("--level");
  if (level === undefined) return undefined;
  if (!isPrivacyLevel(level)) throw new CliError(`Unknown privacy level: ${level}`);
  return level;
}

function requireSession(args: ParsedArgs): string {
  const session = args.values.get("--session");
  if (!session) throw new CliError("--session <id> is required");
  return session;
}

function buildService(args: ParsedArgs): PrivacyService {
  const config = loadConfig({ file: args.values.get("--config") });
  const store = args.values.get("--store");
  // A CLI invocation is one process; sessions must outlive it.
  if (store) {
    config.storage = { kind: "file", directory: store };
  } else if (config.storage.kind === "memory") {
    config.storage = { kind: "file", directory: process.env.TOKENVEIL_STORAGE_PATH || ".tokenveil" };
  }
  return createPrivacyService(config);
}

async function run(service: PrivacyService, args: ParsedArgs): Promise<void> {
  const [command, ...rest] = args.positionals;

  switch (command) {
    case "deidentify": {
      const text = readInput(args, rest[0]);
      const result = await service.deidentify(text, {
        sessionId: args.values.get("--session"),
        privacyLevel: levelOption(args),
      });
      writeOutput(args, result.text);
      console.error(
        `[tokenveil] ${Object.keys(result.tokenMap).length} tokens, session=${result.sessionId}, level=${result.privacyLevel}`
      );
      return;
    }

    case "reconstruct": {
      const text = readInput(args, rest[0]);
      const result = await service.reconstruct(text, requireSession(args));
      writeOutput(args, result.text);
      if (result.unresolvedTokens.length > 0) {
        console.error(`[tokenveil] unresolved: ${result.unresolvedTokens.join(", ")}`);
      }
      return;
    }

    case "enhance": {
      const text = readInput(args, rest[0]);
      writeOutput(args, await service.enhanceForAi(text, requireSession(args)));
      return;
    }

    case "session": {
      const [action, id] = rest;
      if (action === "create") {
        console.log(await service.createSession(levelOption(args)));
      } else if (action === "show" && id) {
        console.log(JSON.stringify(await service.getSession(id), null, 2));
      } else if (action === "delete" && id) {
        const deleted = await service.deleteSession(id);
        console.error(deleted ? `Deleted ${id}` : `No session ${id}`);
        if (!deleted) process.exitCode = 1;
      } else if (action === "list") {
        const maxAge = Number(args.values.get("--max-age") ?? 24 * 60 * 60 * 1000);
        for (const view of await service.listActiveSessions(maxAge)) {
          console.log(`${view.id}\t${view.privacyLevel}\t${view.lastUsed}\t${Object.keys(view.tokenMappings).length}`);
        }
      } else {
        throw new CliError("Usage: tokenveil session create|show <id>|delete <id>|list");
      }
      return;
    }

    default:
      throw new CliError(`Unknown command: ${command ?? "(none)"}`);
  }
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv.length === 0 || argv.includes("-h") || argv.includes("--help")) {
    usage();
    process.exit(0);
  }

  const args = parseArgs(argv);
  const service = buildService(args);
  try {
    await run(service, args);
  } finally {
    await service.close();
  }
}

main().catch((err) => {
  if (err instanceof CliError) {
    console.error(err.message);
  } else if (err instanceof TokenVeilError) {
    console.error(`${err.name} (${err.code}): ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});

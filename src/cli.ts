#!/usr/bin/env node
import "dotenv/config";

import { loadRuntimeConfig } from "./config/runtime.js";
import { getArg, getBool, getInt, parseArgs, type ArgMap } from "./cli/args.js";
import {
  exportSession,
  listSessions,
  runIngest,
  showHistory,
  showStatus,
  viewSession,
} from "./cli/commands.js";
import { startChat } from "./cli/chat.js";
import { MAX_WATCH_INTERVAL_SECONDS } from "./ingest/WatchScheduler.js";
import { runMenu } from "./cli/Menu.js";
import { ReadlinePrompter } from "./cli/Prompter.js";

function printHelp(): void {
  console.log(`
repochat - chat with your codebase

Usage:
  repochat ingest [dir] [--incremental] [--watch] [--interval <seconds>] [--reset]
  repochat chat [--session <name>] [--no-history] [--top-k <n>]
  repochat menu
  repochat sessions
  repochat --view-session <id>
  repochat export <id> [--output <file>]
  repochat history [--limit <n>] [--search <keyword>]
  repochat status

Options:
  --incremental          Re-index only files whose content changed
  --watch                Keep re-indexing on an interval until Ctrl+C
  --interval <seconds>   Watch interval (default: 10)
  --reset                Clear the index and hash map, then run a full pass
  --session <name>       Name for the new chat session
  --no-history           Do not send earlier turns to the model
  --top-k <n>            Chunks retrieved per question

Environment (.env is loaded automatically):
  OPENAI_API_KEY         Required for ingest and chat
  REPOCHAT_DATA_DIR      Where index, sessions and history live (default: ./.repochat)
  QDRANT_URL             Use a Qdrant server instead of the local index

Examples:
  repochat ingest ./src
  repochat ingest . --incremental --watch --interval 30
  repochat chat --session "auth refactor"
`);
}

/**
 * AbortController aborted by the first SIGINT/SIGTERM; a second one exits
 */
function interruptController(): AbortController {
  const controller = new AbortController();
  const onSignal = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.log("\nStopping after the current step (Ctrl+C again to force)...");
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return controller;
}

async function ingestCommand(positionals: string[], args: ArgMap): Promise<void> {
  const config = loadRuntimeConfig(process.env, { requireApiKey: true });
  const controller = interruptController();
  await runIngest(config, {
    dir: positionals[0] ?? ".",
    incremental: getBool(args, "incremental", false),
    watch: getBool(args, "watch", false),
    reset: getBool(args, "reset", false),
    intervalSeconds: getInt(args, "interval", 10, MAX_WATCH_INTERVAL_SECONDS),
    signal: controller.signal,
  });
}

async function chatCommand(args: ArgMap): Promise<void> {
  const config = loadRuntimeConfig(process.env, { requireApiKey: true });
  const sessionName = getArg(args, "session");
  const topK = args["top-k"] === undefined ? undefined : getInt(args, "top-k", config.chat.topK);
  const prompter = new ReadlinePrompter();
  try {
    await startChat(config, prompter, {
      useHistory: !getBool(args, "no-history", false),
      ...(sessionName !== undefined && { sessionName }),
      ...(topK !== undefined && { topK }),
    });
  } finally {
    prompter.close();
  }
}

async function menuCommand(): Promise<void> {
  const config = loadRuntimeConfig(process.env);
  const prompter = new ReadlinePrompter();
  try {
    await runMenu(config, prompter);
  } finally {
    prompter.close();
  }
}

async function main(): Promise<void> {
  const { command, positionals, args } = parseArgs(process.argv.slice(2));

  if (args["help"] === true || command === "help") {
    printHelp();
    return;
  }

  const viewId = getArg(args, "view-session");
  if (viewId !== undefined) {
    viewSession(loadRuntimeConfig(process.env), viewId);
    return;
  }

  switch (command) {
    case "ingest":
      await ingestCommand(positionals, args);
      return;
    case "chat":
      await chatCommand(args);
      return;
    case "":
    case "menu":
      await menuCommand();
      return;
    case "sessions":
      listSessions(loadRuntimeConfig(process.env));
      return;
    case "export": {
      const id = positionals[0];
      if (!id) {
        throw new Error("Usage: repochat export <id> [--output <file>]");
      }
      exportSession(loadRuntimeConfig(process.env), id, getArg(args, "output"));
      return;
    }
    case "history": {
      const search = getArg(args, "search");
      showHistory(loadRuntimeConfig(process.env), {
        limit: getInt(args, "limit", 20),
        ...(search !== undefined && { search }),
      });
      return;
    }
    case "status":
      await showStatus(loadRuntimeConfig(process.env));
      return;
    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exitCode = 1;
  }
}

main()
  .then(() => {
    // Keep-alive sockets held by the API clients would otherwise delay exit
    process.exit(process.exitCode ?? 0);
  })
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });

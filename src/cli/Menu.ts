/**
 * Interactive main menu
 */

import { createLocalServices, type RuntimeConfig } from "../config/runtime.js";
import { ConfigurationError, toError } from "../types/index.js";
import type { Prompter } from "./Prompter.js";
import {
  exportSession,
  listSessions,
  printQueryEntries,
  runIngest,
  showStatus,
  viewSession,
} from "./commands.js";
import { startChat } from "./chat.js";
import { MAX_WATCH_INTERVAL_SECONDS } from "../ingest/WatchScheduler.js";

const MENU = [
  "",
  "=== repochat ===",
  "  1. Chat with the codebase",
  "  2. Ingest a directory",
  "  3. Watch a directory",
  "  4. Query history",
  "  5. Sessions",
  "  6. Export a session",
  "  7. Settings",
  "  8. Exit",
];

function requireApiKey(config: RuntimeConfig): void {
  if (!config.openai.apiKey) {
    throw new ConfigurationError(
      "OPENAI_API_KEY not found in environment variables. Create a .env file (see .env.example) or export it."
    );
  }
}

function isYes(answer: string | null): boolean {
  return answer !== null && ["y", "yes"].includes(answer.trim().toLowerCase());
}

async function ingestFromMenu(config: RuntimeConfig, prompter: Prompter, watch: boolean): Promise<void> {
  requireApiKey(config);
  const dir = (await prompter.ask("Directory [.]: "))?.trim() || ".";
  const incremental = isYes(await prompter.ask("Only re-index changed files? [y/N]: "));
  let intervalSeconds = 10;
  if (watch) {
    const raw = (await prompter.ask("Interval in seconds [10]: "))?.trim();
    if (raw) {
      const parsed = Number(raw);
      if (!Number.isInteger(parsed) || parsed <= 0 || parsed > MAX_WATCH_INTERVAL_SECONDS) {
        console.log(`Interval must be a whole number of seconds between 1 and ${MAX_WATCH_INTERVAL_SECONDS}.`);
        return;
      }
      intervalSeconds = parsed;
    }
  }

  const controller = new AbortController();
  const release = prompter.onInterrupt(() => {
    console.log("\nStopping...");
    controller.abort();
  });
  try {
    await runIngest(config, { dir, incremental, watch, reset: false, intervalSeconds, signal: controller.signal });
  } finally {
    release();
  }
}

async function historyFromMenu(config: RuntimeConfig, prompter: Prompter): Promise<void> {
  const { queryLog } = createLocalServices(config);
  if (queryLog.size() === 0) {
    console.log("No queries yet.");
    return;
  }
  const keyword = (await prompter.ask("Search keyword (Enter for recent): "))?.trim();
  const entries = keyword ? queryLog.search(keyword) : queryLog.recent(20);
  if (entries.length === 0) {
    console.log(`No queries matching "${keyword ?? ""}".`);
    return;
  }
  printQueryEntries(entries);
}

async function sessionsFromMenu(config: RuntimeConfig, prompter: Prompter): Promise<void> {
  const { sessionStore } = createLocalServices(config);
  listSessions(config);
  if (sessionStore.listSessions().length === 0) {
    return;
  }

  const id = (await prompter.ask("Session id to open (Enter to go back): "))?.trim();
  if (!id) {
    return;
  }
  viewSession(config, id);

  if (isYes(await prompter.ask("Delete this session? [y/N]: "))) {
    if (isYes(await prompter.ask(`Really delete ${id}? This cannot be undone [y/N]: `))) {
      sessionStore.deleteSession(id);
      console.log(`Deleted session ${id}.`);
    }
  }
}

async function exportFromMenu(config: RuntimeConfig, prompter: Prompter): Promise<void> {
  const { sessionStore } = createLocalServices(config);
  listSessions(config);
  if (sessionStore.listSessions().length === 0) {
    return;
  }
  const id = (await prompter.ask("Session id to export: "))?.trim();
  if (!id) {
    return;
  }
  const fallback = sessionStore.defaultExportPath(id);
  const output = (await prompter.ask(`Output file [${fallback}]: `))?.trim();
  exportSession(config, id, output || undefined);
}

/**
 * Runs until the user picks Exit or input ends. Errors from a single action
 * are reported and the menu is shown again.
 */
export async function runMenu(config: RuntimeConfig, prompter: Prompter): Promise<void> {
  for (;;) {
    for (const line of MENU) console.log(line);
    const choice = await prompter.ask("Choose an option: ");
    if (choice === null) {
      return;
    }

    try {
      switch (choice.trim()) {
        case "1": {
          requireApiKey(config);
          const name = (await prompter.ask("Session name (optional): "))?.trim();
          const withHistory = !isYes(await prompter.ask("Disable conversation history? [y/N]: "));
          await startChat(config, prompter, {
            useHistory: withHistory,
            ...(name && { sessionName: name }),
          });
          break;
        }
        case "2":
          await ingestFromMenu(config, prompter, false);
          break;
        case "3":
          await ingestFromMenu(config, prompter, true);
          break;
        case "4":
          await historyFromMenu(config, prompter);
          break;
        case "5":
          await sessionsFromMenu(config, prompter);
          break;
        case "6":
          await exportFromMenu(config, prompter);
          break;
        case "7":
          await showStatus(config);
          break;
        case "8":
        case "q":
        case "exit":
          return;
        default:
          console.log("Please choose 1-8.");
      }
    } catch (error) {
      console.error(`Error: ${toError(error).message}`);
    }
  }
}

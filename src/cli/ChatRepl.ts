import { ChatRequestError, NoRelevantContextError, type ChatOrchestrator } from "../chat/ChatOrchestrator.js";
import { SessionExportError, type SessionStore } from "../session/SessionStore.js";
import type { Session, SessionId } from "../types/index.js";
import type { Prompter } from "./Prompter.js";

export interface ChatReplDeps {
  orchestrator: ChatOrchestrator;
  sessionStore: SessionStore;
  prompter: Prompter;
}

export interface ChatReplOptions {
  sessionName?: string;
  useHistory: boolean;
  topK?: number;
}

const EXIT_WORDS = new Set(["exit", "quit", "q"]);

const HELP_TEXT = [
  "Commands:",
  "  /export [file]  Export this session to Markdown",
  "  /sources        Show the sources of the last answer",
  "  /help           Show this help",
  "  exit, quit, q   End the session",
];

/**
 * Errors after which the user can simply ask again. Storage failures in the
 * vector store or the session file end the session instead.
 */
function isRecoverable(error: unknown): error is Error {
  return error instanceof NoRelevantContextError || error instanceof ChatRequestError;
}

function runSlashCommand(
  input: string,
  sessionStore: SessionStore,
  sessionId: SessionId,
  lastSources: readonly string[]
): void {
  const [command = "", ...rest] = input.split(/\s+/);
  const argument = rest.join(" ");

  switch (command) {
    case "/help":
      for (const line of HELP_TEXT) console.log(line);
      return;
    case "/sources":
      if (lastSources.length === 0) {
        console.log("No sources yet.");
      } else {
        lastSources.forEach((source, i) => console.log(`  ${i + 1}. ${source}`));
      }
      return;
    case "/export": {
      try {
        const written = sessionStore.exportMarkdown(sessionId, argument || undefined);
        console.log(`Exported session to ${written}`);
      } catch (error) {
        if (!(error instanceof SessionExportError)) {
          throw error;
        }
        console.error(`Error: ${error.message}`);
      }
      return;
    }
    default:
      console.log(`Unknown command ${command}. Type /help for commands.`);
  }
}

/**
 * Interactive question/answer loop bound to a new session. The session is
 * ended when the loop exits, whichever way it exits.
 */
export async function runChatRepl(deps: ChatReplDeps, options: ChatReplOptions): Promise<Session> {
  const { orchestrator, sessionStore, prompter } = deps;
  const session = sessionStore.createSession(options.sessionName);
  let lastSources: string[] = [];

  console.log(`Started session ${session.id} (${session.name})`);
  console.log(`History: ${options.useHistory ? "on" : "off"}. Type /help for commands.`);

  try {
    for (;;) {
      const line = await prompter.ask("\nYou: ");
      if (line === null) {
        break;
      }
      const input = line.trim();
      if (input === "") {
        continue;
      }
      if (EXIT_WORDS.has(input.toLowerCase())) {
        break;
      }

      try {
        if (input.startsWith("/")) {
          runSlashCommand(input, sessionStore, session.id, lastSources);
          continue;
        }

        const result = await orchestrator.converse(session.id, input, {
          useHistory: options.useHistory,
          ...(options.topK !== undefined && { k: options.topK }),
        });
        lastSources = result.sources;
        console.log(`\nAssistant: ${result.answer}`);
        if (result.sources.length > 0) {
          console.log(`\nSources: ${result.sources.join(", ")}`);
        }
      } catch (error) {
        if (!isRecoverable(error)) {
          throw error;
        }
        console.error(`Error: ${error.message}`);
      }
    }
  } finally {
    sessionStore.endSession(session.id);
  }

  console.log(`Session saved: ${session.id}`);
  return sessionStore.getSession(session.id);
}

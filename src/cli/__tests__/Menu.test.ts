import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { runMenu } from "../Menu.js";
import { createLocalServices, loadRuntimeConfig, type RuntimeConfig } from "../../config/runtime.js";
import { ScriptedPrompter } from "./ScriptedPrompter.js";

describe("runMenu", () => {
  let dir: string;
  let config: RuntimeConfig;
  let log: MockInstance<typeof console.log>;
  let errors: MockInstance<typeof console.error>;

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "repochat-menu-"));
    config = loadRuntimeConfig({ REPOCHAT_DATA_DIR: dir });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function printed(): string[] {
    return log.mock.calls.map((call) => String(call[0]));
  }

  it("should exit on 8", async () => {
    const prompter = new ScriptedPrompter(["8", "4"]);
    await runMenu(config, prompter);
    expect(prompter.prompts).toEqual(["Choose an option: "]);
  });

  it("should stop when input ends", async () => {
    await expect(runMenu(config, new ScriptedPrompter([]))).resolves.toBeUndefined();
  });

  it("should report a missing API key and show the menu again", async () => {
    await runMenu(config, new ScriptedPrompter(["2", "8"]));

    expect(errors).toHaveBeenCalledWith(
      "Error: OPENAI_API_KEY not found in environment variables. Create a .env file (see .env.example) or export it."
    );
  });

  it("should reject an unknown choice", async () => {
    await runMenu(config, new ScriptedPrompter(["9", "8"]));
    expect(printed()).toContain("Please choose 1-8.");
  });

  it("should show recent queries", async () => {
    const { queryLog } = createLocalServices(config);
    queryLog.append("where is auth?", "in src/auth.ts", ["src/auth.ts"]);

    await runMenu(config, new ScriptedPrompter(["4", "", "8"]));

    expect(printed()).toContain(`[${queryLog.recent()[0]?.timestamp}] where is auth?`);
    expect(printed()).toContain("  -> in src/auth.ts");
  });

  it("should delete a session only after two confirmations", async () => {
    const { sessionStore } = createLocalServices(config);
    const { id } = sessionStore.createSession("temp");

    await runMenu(config, new ScriptedPrompter(["5", id, "y", "n", "8"]));
    expect(sessionStore.hasSession(id)).toBe(true);

    await runMenu(config, new ScriptedPrompter(["5", id, "y", "yes", "8"]));
    expect(sessionStore.hasSession(id)).toBe(false);
    expect(printed()).toContain(`Deleted session ${id}.`);
  });

  it("should export a session to the chosen file", async () => {
    const { sessionStore } = createLocalServices(config);
    const { id } = sessionStore.createSession("temp");
    const target = path.join(dir, "exports", "temp.md");

    await runMenu(config, new ScriptedPrompter(["6", id, target, "8"]));

    expect(fs.readFileSync(target, "utf-8").startsWith("# temp\n")).toBe(true);
  });
});

import { loadExerciseCatalog } from "./catalog.js";
import type { Config } from "./config.js";
import { isAppError } from "./errors.js";
import { createRecordStore, ensureLogDirectory, type Clock } from "./recordStore.js";
import { collectUserProfile, runSessions } from "./session.js";
import type { Terminal } from "./terminal.js";

/**
 * Welcome, log directory, catalog, profile, then sessions until the user
 * stops or input ends.
 */
export async function runApp(config: Config, terminal: Terminal, now: Clock = () => new Date()): Promise<void> {
  const verbose = config.nodeEnv !== "production";
  terminal.say("--- Welcome to the Fitness Tracker App! ---", "title");

  if (await ensureLogDirectory(config.logDir)) {
    terminal.say(`Successfully created directory: ${config.logDir}`, "success");
  }
  const catalog = await loadExerciseCatalog(config.catalogPath, { verbose });
  const store = createRecordStore({ dir: config.logDir, fileExtension: config.fileExtension, now, verbose });
  const prompt = { maxAttempts: config.maxAttempts };

  try {
    terminal.say("");
    const profile = await collectUserProfile(terminal, prompt);
    await runSessions({ profile, catalog, terminal, store, now, prompt });
  } catch (err) {
    // stdin closed (Ctrl-D or end of a pipe): finish like a normal exit
    if (!isAppError(err, "INPUT_CLOSED")) throw err;
  }

  terminal.say("Goodbye!", "title");
}

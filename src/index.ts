#!/usr/bin/env node
import { spawn } from "node:child_process";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { LibraryService } from "./library-service";
import { logger, setLogLevel } from "./logger";
import { SessionManager } from "./session-manager";

const USAGE = [
  "Usage: spotify-library-link <command>",
  "",
  "Commands:",
  "  login                                   Connect a Spotify account",
  "  status                                  Show the current session",
  "  logout                                  Forget stored tokens",
  "  playlists                               List the user's playlists",
  "  saved                                   List liked songs",
  "  playlist <id>                           Show a playlist with its tracks",
  "  credentials <client-id> <client-secret> Override the app credentials (\"\" clears)"
].join("\n");

function openBrowser(url: string): void {
  const platform = process.platform;

  if (platform === "win32") {
    spawn("cmd", ["/c", "start", "", url], { detached: true, stdio: "ignore" }).unref();
    return;
  }

  if (platform === "darwin") {
    spawn("open", [url], { detached: true, stdio: "ignore" }).unref();
    return;
  }

  spawn("xdg-open", [url], { detached: true, stdio: "ignore" }).unref();
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

async function main(argv: string[]): Promise<void> {
  const [command, ...args] = argv;
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const session = new SessionManager({
    dataDir: config.dataDir,
    callbackPort: config.callbackPort,
    requestTimeoutMs: config.requestTimeoutMs,
    defaultCredentials: {
      clientId: config.defaultClientId,
      clientSecret: config.defaultClientSecret
    }
  });
  const library = new LibraryService(session);

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("Interrupted")));

  switch (command) {
    case "login": {
      const { url } = await session.startLogin(controller.signal);
      console.log("Opening Spotify authorization URL in your browser...");
      console.log("If it does not open automatically, use this URL:\n");
      console.log(url);
      openBrowser(url);

      await session.waitForLogin();
      printJson(await session.status(controller.signal));
      return;
    }
    case "status":
      printJson(await session.status(controller.signal));
      return;
    case "logout":
      await session.logout();
      logger.info("Spotify account disconnected.");
      return;
    case "playlists":
      printJson(await library.fetchPlaylists(controller.signal));
      return;
    case "saved":
      printJson(await library.fetchSavedTracks(controller.signal));
      return;
    case "playlist": {
      const [playlistId] = args;
      if (!playlistId) {
        throw new Error("playlist requires a playlist id");
      }

      printJson(await library.fetchPlaylistWithTracks(playlistId, controller.signal));
      return;
    }
    case "credentials": {
      const [clientId = "", clientSecret = ""] = args;
      await session.setClientCredentials({ clientId, clientSecret });
      logger.info(clientId || clientSecret ? "Saved client credential overrides." : "Cleared client credential overrides.");
      return;
    }
    default:
      console.log(USAGE);
      if (command !== undefined && command !== "help") {
        process.exitCode = 1;
      }
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  logger.error(`Command failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});

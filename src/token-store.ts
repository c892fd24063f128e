import { promises as fs } from "node:fs";
import path from "node:path";
import { errorMessage } from "./errors";
import type { TokenRecord } from "./types";

const TOKEN_FILE = "spotify_oauth.json";
const CLIENT_ID_FILE = "spotify_client_id";
const CLIENT_SECRET_FILE = "spotify_client_secret";

export interface StorePaths {
  tokenFile: string;
  clientIdFile: string;
  clientSecretFile: string;
}

export function storePaths(dataDir: string): StorePaths {
  return {
    tokenFile: path.join(dataDir, TOKEN_FILE),
    clientIdFile: path.join(dataDir, CLIENT_ID_FILE),
    clientSecretFile: path.join(dataDir, CLIENT_SECRET_FILE)
  };
}

interface PersistedTokens {
  access_token: string;
  refresh_token: string;
  expires_at: number;
  scope: string;
  token_type: string;
}

function isMissingFile(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === "ENOENT";
}

async function writePrivateFile(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true, mode: 0o755 });
  await fs.writeFile(filePath, contents, { encoding: "utf8", mode: 0o600 });
  // mode only applies when the file is created
  await fs.chmod(filePath, 0o600);
}

export async function readTokens(tokenFilePath: string): Promise<TokenRecord | null> {
  let raw: string;
  try {
    raw = await fs.readFile(tokenFilePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }

    throw new Error(`Failed to read token file (${tokenFilePath}): ${errorMessage(error)}`);
  }

  let parsed: Partial<PersistedTokens>;
  try {
    parsed = JSON.parse(raw) as Partial<PersistedTokens>;
  } catch (error) {
    throw new Error(`Failed to parse token file (${tokenFilePath}): ${errorMessage(error)}`);
  }

  if (typeof parsed.access_token !== "string" || !parsed.access_token) {
    return null;
  }

  return {
    accessToken: parsed.access_token,
    refreshToken: typeof parsed.refresh_token === "string" ? parsed.refresh_token : "",
    expiresAt: typeof parsed.expires_at === "number" ? parsed.expires_at : 0,
    scope: typeof parsed.scope === "string" ? parsed.scope : "",
    tokenType: typeof parsed.token_type === "string" ? parsed.token_type : ""
  };
}

export async function writeTokens(tokenFilePath: string, tokens: TokenRecord): Promise<void> {
  if (!tokens.accessToken) {
    throw new Error("Refusing to persist a token record without an access token");
  }

  const persisted: PersistedTokens = {
    access_token: tokens.accessToken,
    refresh_token: tokens.refreshToken,
    expires_at: tokens.expiresAt,
    scope: tokens.scope,
    token_type: tokens.tokenType
  };

  await writePrivateFile(tokenFilePath, `${JSON.stringify(persisted, null, 2)}\n`);
}

export async function deleteFileIfExists(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}

/** Trimmed contents of an override file, or "" when it is absent or blank. */
export async function readOverride(filePath: string): Promise<string> {
  try {
    return (await fs.readFile(filePath, "utf8")).trim();
  } catch (error) {
    if (isMissingFile(error)) {
      return "";
    }

    throw error;
  }
}

/** An empty value clears the override. */
export async function writeOverride(filePath: string, value: string): Promise<void> {
  const trimmed = value.trim();
  if (!trimmed) {
    await deleteFileIfExists(filePath);
    return;
  }

  await writePrivateFile(filePath, trimmed);
}

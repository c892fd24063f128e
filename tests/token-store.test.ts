import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  deleteFileIfExists,
  readOverride,
  readTokens,
  storePaths,
  writeOverride,
  writeTokens
} from "../src/token-store";
import type { TokenRecord } from "../src/types";

const record: TokenRecord = {
  accessToken: "test-access",
  refreshToken: "test-refresh",
  expiresAt: 1700003600,
  scope: "user-library-read",
  tokenType: "Bearer"
};

describe("token store", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "library-link-store-"));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("round-trips a token record", async () => {
    const { tokenFile } = storePaths(dataDir);

    await writeTokens(tokenFile, record);

    expect(await readTokens(tokenFile)).toEqual(record);
  });

  it("writes snake_case JSON readable only by the owner", async () => {
    const tokenFile = path.join(dataDir, "nested", "spotify_oauth.json");

    await writeTokens(tokenFile, record);

    const raw = JSON.parse(await fs.readFile(tokenFile, "utf8"));
    expect(raw).toEqual({
      access_token: "test-access",
      refresh_token: "test-refresh",
      expires_at: 1700003600,
      scope: "user-library-read",
      token_type: "Bearer"
    });

    if (process.platform !== "win32") {
      const stat = await fs.stat(tokenFile);
      expect(stat.mode & 0o777).toBe(0o600);
    }
  });

  it("overwrites the whole file on rewrite", async () => {
    const { tokenFile } = storePaths(dataDir);

    await writeTokens(tokenFile, { ...record, scope: "a much longer scope string than the next one" });
    await writeTokens(tokenFile, { ...record, scope: "short" });

    expect((await readTokens(tokenFile))?.scope).toBe("short");
  });

  it("refuses to persist a record without an access token", async () => {
    const { tokenFile } = storePaths(dataDir);

    await expect(writeTokens(tokenFile, { ...record, accessToken: "" })).rejects.toThrow(
      "Refusing to persist a token record without an access token"
    );
    await expect(fs.access(tokenFile)).rejects.toThrow();
  });

  it("returns null when no token file exists", async () => {
    expect(await readTokens(storePaths(dataDir).tokenFile)).toBeNull();
  });

  it("reports a corrupt token file", async () => {
    const { tokenFile } = storePaths(dataDir);
    await fs.writeFile(tokenFile, "{not json", "utf8");

    await expect(readTokens(tokenFile)).rejects.toThrow(`Failed to parse token file (${tokenFile})`);
  });

  it("deletes missing files without error", async () => {
    await expect(deleteFileIfExists(path.join(dataDir, "absent.json"))).resolves.toBeUndefined();
  });
});

describe("credential overrides", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "library-link-override-"));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("trims values and treats a blank file as unset", async () => {
    const { clientIdFile } = storePaths(dataDir);

    expect(await readOverride(clientIdFile)).toBe("");

    await writeOverride(clientIdFile, "  test-client  ");
    expect(await fs.readFile(clientIdFile, "utf8")).toBe("test-client");
    expect(await readOverride(clientIdFile)).toBe("test-client");

    await fs.writeFile(clientIdFile, "   \n", "utf8");
    expect(await readOverride(clientIdFile)).toBe("");
  });

  it("removes the override when written empty", async () => {
    const { clientSecretFile } = storePaths(dataDir);

    await writeOverride(clientSecretFile, "test-secret");
    await writeOverride(clientSecretFile, "   ");

    await expect(fs.access(clientSecretFile)).rejects.toThrow();
  });
});

import { existsSync } from "node:fs";
import { join } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { ProbeError } from "../probe-error.js";

const ACCESS_TOKEN_KEY = "cursorAuth/accessToken";

/** Where Cursor keeps its global state database */
export function cursorDatabasePath(homeDir: string, platform: NodeJS.Platform = process.platform): string {
  const base =
    platform === "darwin"
      ? join(homeDir, "Library", "Application Support", "Cursor")
      : platform === "win32"
        ? join(homeDir, "AppData", "Roaming", "Cursor")
        : join(homeDir, ".config", "Cursor");
  return join(base, "User", "globalStorage", "state.vscdb");
}

/** Reads the signed-in access token; null when the database or the key is missing */
export function readCursorAccessToken(dbPath: string): string | null {
  if (!existsSync(dbPath)) return null;

  let db: Database.Database;
  try {
    db = new Database(dbPath, { readonly: true, fileMustExist: true });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw ProbeError.executionFailed(`Failed to read Cursor database: ${reason}`);
  }

  try {
    const row = db.prepare("SELECT value FROM ItemTable WHERE key = ?").get(ACCESS_TOKEN_KEY);
    const parsed = z.object({ value: z.union([z.string(), z.instanceof(Buffer)]) }).safeParse(row);
    if (!parsed.success) return null;
    const token = String(parsed.data.value).trim();
    return token || null;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw ProbeError.executionFailed(`Failed to read Cursor database: ${reason}`);
  } finally {
    db.close();
  }
}

const jwtPayloadSchema = z.object({ sub: z.string().min(1) });

/** The `sub` claim of a JWT, without verifying the signature */
export function jwtSubject(token: string): string {
  const payload = token.split(".")[1];
  if (!payload) throw ProbeError.parseFailed("Invalid JWT format");

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payload, "base64url").toString("utf-8"));
  } catch {
    throw ProbeError.parseFailed("Failed to decode JWT payload");
  }

  const parsed = jwtPayloadSchema.safeParse(decoded);
  if (!parsed.success) throw ProbeError.parseFailed("JWT payload missing 'sub' claim");
  return parsed.data.sub;
}

/** Session cookie the dashboard API expects */
export function cursorSessionCookie(accessToken: string): string {
  return `WorkosCursorSessionToken=${jwtSubject(accessToken)}::${accessToken}`;
}

/**
 * Cookie Store
 *
 * Persists the Shopee session cookies captured at login to
 * <config dir>/cookies.json (owner read/write only) and hands them back to
 * new sessions. Files that fail validation or are older than 24 hours are
 * treated as absent.
 */
import fs from "fs";
import path from "path";
import Joi from "joi";
import config from "../config";
import { SESSION } from "../config/constants";
import { logger as defaultLogger, type Logger } from "../monitoring/logger";
import type { StoredCookie } from "../shared/types/shopee.types";

interface CookieFile {
  cookies: StoredCookie[];
  /** Epoch seconds */
  saved_at: number;
}

const cookieSchema = Joi.object({
  name: Joi.string().required(),
  value: Joi.string().allow("").required(),
  domain: Joi.string(),
  path: Joi.string(),
  expires: Joi.number(),
  httpOnly: Joi.boolean(),
  secure: Joi.boolean(),
});

const cookieFileSchema = Joi.object<CookieFile>({
  cookies: Joi.array().items(cookieSchema).required(),
  saved_at: Joi.number().min(0).required(),
});

export interface CookieStoreOptions {
  dir?: string;
  maxAgeSeconds?: number;
  /** Current time in epoch seconds */
  now?: () => number;
  logger?: Logger;
}

export class CookieStore {
  private dir: string;
  private maxAgeSeconds: number;
  private now: () => number;
  private log: Logger;

  constructor(options: CookieStoreOptions = {}) {
    this.dir = options.dir ?? config.configDir;
    this.maxAgeSeconds = options.maxAgeSeconds ?? SESSION.COOKIE_MAX_AGE_SECONDS;
    this.now = options.now ?? (() => Date.now() / 1000);
    this.log = options.logger ?? defaultLogger;
  }

  get cookiesPath(): string {
    return path.join(this.dir, "cookies.json");
  }

  /** Persistent Chrome profile directory, created on first use */
  profileDir(): string {
    const profile = path.join(this.dir, "chrome-profile");
    fs.mkdirSync(profile, { recursive: true });
    return profile;
  }

  /**
   * Saved cookies, or null when there are none, they are unreadable, or
   * they are stale.
   */
  load(): StoredCookie[] | null {
    if (!fs.existsSync(this.cookiesPath)) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.cookiesPath, "utf8"));
    } catch (error) {
      this.log.warn({ path: this.cookiesPath, error: (error as Error).message }, "Cookie file is not valid JSON");
      return null;
    }

    const { error, value } = cookieFileSchema.validate(parsed, { stripUnknown: true });
    if (error) {
      this.log.warn({ path: this.cookiesPath, error: error.message }, "Cookie file failed validation");
      return null;
    }

    const age = this.now() - value.saved_at;
    if (age > this.maxAgeSeconds) {
      this.log.info({ ageSeconds: Math.round(age) }, "Saved cookies are stale");
      return null;
    }
    return value.cookies;
  }

  save(cookies: StoredCookie[]): string {
    fs.mkdirSync(this.dir, { recursive: true });
    const data: CookieFile = { cookies, saved_at: this.now() };
    fs.writeFileSync(this.cookiesPath, JSON.stringify(data, null, 2), { mode: 0o600 });
    // writeFileSync only applies mode when it creates the file
    fs.chmodSync(this.cookiesPath, 0o600);
    return this.cookiesPath;
  }

  clear(): boolean {
    if (!fs.existsSync(this.cookiesPath)) return false;
    fs.unlinkSync(this.cookiesPath);
    return true;
  }
}

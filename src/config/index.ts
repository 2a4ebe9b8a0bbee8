/**
 * Environment Configuration
 *
 * Centralizes all environment variables into a typed configuration object.
 * All modules import config from here instead of reading process.env directly.
 *
 * Groups:
 * - Runtime: environment name and log level
 * - Captcha: 2Captcha key and endpoint for slider CAPTCHA solving
 * - Browser: Chrome binary, headless switch and timeouts
 * - Storage: per-user config directory for cookies and the Chrome profile
 */
import os from "os";
import path from "path";
import dotenv from "dotenv";
import { defaultEnvFiles, resolveApiKey } from "./api-key";

dotenv.config();

function resolveConfigDir(): string {
  const base = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(base, "shopee-cli");
}

const config = {
  // --- Runtime ---
  env: process.env.NODE_ENV || "development",
  logLevel: process.env.LOG_LEVEL || "info",

  // --- 2Captcha ---
  twoCaptchaApiKey:
    resolveApiKey({ env: process.env, envFiles: defaultEnvFiles() }) || "",
  twoCaptchaBaseUrl: process.env.TWO_CAPTCHA_BASE_URL || "https://api.2captcha.com",

  // --- Browser ---
  chromePath: process.env.CHROME_PATH || "",
  browserHeadless: process.env.BROWSER_HEADLESS === "true",
  navigationTimeoutMs: parseInt(process.env.NAVIGATION_TIMEOUT_MS || "30000", 10),
  loginTimeoutMs: parseInt(process.env.LOGIN_TIMEOUT_MS || "600000", 10),

  // --- Storage ---
  configDir: resolveConfigDir(),
};

export default config;

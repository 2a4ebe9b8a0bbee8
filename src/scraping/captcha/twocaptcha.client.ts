/**
 * 2Captcha API Client
 *
 * Sends the cropped slider CAPTCHA to 2Captcha as a CoordinatesTask and
 * polls until a worker has clicked the slot position.
 *
 * API docs: https://2captcha.com/api-docs/coordinates
 *
 * Flow:
 * 1. POST createTask with the base64 PNG and an instruction
 * 2. Poll getTaskResult every 2 seconds (up to 60 seconds)
 *    - before each poll a keepalive hook nudges the widget and reports
 *      whether it is still on the page; if not, polling stops early
 * 3. Read solution.coordinates from the first "ready" result
 * 4. reportCorrect / reportIncorrect once the drag outcome is known
 */
import axios from "axios";
import config from "../../config";
import { CAPTCHA } from "../../config/constants";
import { logger as defaultLogger, type Logger } from "../../monitoring/logger";
import { OracleError } from "../../shared/errors/captcha.errors";
import { sleep as defaultSleep, type Sleep } from "../../shared/utils/sleep";
import type {
  CoordinateOracle,
  KeepaliveHook,
  OracleCoordinate,
  PollOutcome,
} from "../../shared/types/captcha.types";

const REQUEST_TIMEOUT_MS = 30000;

/** JSON POST to a 2Captcha endpoint; resolves to the response body */
export interface OracleTransport {
  post<T>(endpoint: string, payload: object): Promise<T>;
}

export function createAxiosTransport(
  baseUrl: string = config.twoCaptchaBaseUrl,
  timeoutMs: number = REQUEST_TIMEOUT_MS
): OracleTransport {
  const http = axios.create({
    baseURL: baseUrl,
    timeout: timeoutMs,
    headers: { "Content-Type": "application/json" },
  });
  return {
    async post<T>(endpoint: string, payload: object): Promise<T> {
      const response = await http.post<T>(`/${endpoint}`, payload);
      return response.data;
    },
  };
}

interface ApiResponse {
  errorId: number;
  errorCode?: string;
  errorDescription?: string;
}

interface CreateTaskResponse extends ApiResponse {
  taskId?: number | string;
}

interface TaskResultResponse extends ApiResponse {
  status?: "processing" | "ready";
  solution?: { coordinates?: OracleCoordinate[] };
}

export interface TwoCaptchaClientOptions {
  apiKey?: string;
  transport?: OracleTransport;
  pollIntervalMs?: number;
  pollTimeoutMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export class TwoCaptchaClient implements CoordinateOracle {
  private apiKey: string;
  private transport: OracleTransport;
  private pollIntervalMs: number;
  private pollTimeoutMs: number;
  private sleep: Sleep;
  private log: Logger;

  constructor(options: TwoCaptchaClientOptions = {}) {
    this.apiKey = options.apiKey ?? config.twoCaptchaApiKey;
    this.transport = options.transport ?? createAxiosTransport();
    this.pollIntervalMs = options.pollIntervalMs ?? CAPTCHA.POLL_INTERVAL_MS;
    this.pollTimeoutMs = options.pollTimeoutMs ?? CAPTCHA.POLL_TIMEOUT_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Check if the 2Captcha API key is configured.
   */
  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * Upload the cropped CAPTCHA. Returns the task id, or null when 2Captcha
   * refuses the task.
   */
  async submit(imageBase64: string): Promise<string | null> {
    const response = await this.request<CreateTaskResponse>("createTask", {
      clientKey: this.apiKey,
      task: {
        type: "CoordinatesTask",
        body: imageBase64,
        comment: CAPTCHA.INSTRUCTION,
      },
    });

    if (response.errorId !== 0) {
      this.logApiError(response, "createTask");
      return null;
    }
    if (response.taskId === undefined || response.taskId === "") {
      this.log.warn({ response }, "2Captcha: createTask returned no task id");
      return null;
    }

    const taskId = String(response.taskId);
    this.log.info({ taskId }, "2Captcha: task submitted, polling for coordinates");
    return taskId;
  }

  /**
   * Poll until the task is ready. The number of polls is bounded by
   * pollTimeoutMs / pollIntervalMs.
   */
  async poll(taskId: string, keepalive?: KeepaliveHook): Promise<PollOutcome> {
    const maxPolls = Math.ceil(this.pollTimeoutMs / this.pollIntervalMs);

    for (let i = 0; i < maxPolls; i++) {
      await this.sleep(this.pollIntervalMs);

      if (keepalive && !(await this.widgetStillAlive(keepalive, taskId))) {
        this.log.info({ taskId, polls: i }, "2Captcha: CAPTCHA expired while waiting for coordinates");
        return { status: "expired" };
      }

      const response = await this.request<TaskResultResponse>("getTaskResult", {
        clientKey: this.apiKey,
        taskId,
      });

      if (response.errorId !== 0) {
        this.logApiError(response, "getTaskResult");
        return {
          status: "failed",
          reason: response.errorDescription || response.errorCode || "unknown",
        };
      }
      if (response.status === "ready") {
        const coordinates = response.solution?.coordinates ?? [];
        this.log.info({ taskId, coordinates }, "2Captcha: coordinates received");
        return { status: "ready", coordinates };
      }
    }

    this.log.warn(
      { taskId, maxWait: `${this.pollTimeoutMs / 1000}s` },
      "2Captcha: polling timed out"
    );
    return { status: "timeout" };
  }

  /**
   * Tell 2Captcha whether the answer worked. Never throws: a lost report
   * must not hide the outcome it describes.
   */
  async report(taskId: string, correct: boolean): Promise<boolean> {
    const endpoint = correct ? "reportCorrect" : "reportIncorrect";
    try {
      const response = await this.request<ApiResponse>(endpoint, {
        clientKey: this.apiKey,
        taskId,
      });
      return response.errorId === 0;
    } catch (error) {
      this.log.debug({ taskId, endpoint, error: (error as Error).message }, "2Captcha: report not delivered");
      return false;
    }
  }

  private async widgetStillAlive(keepalive: KeepaliveHook, taskId: string): Promise<boolean> {
    try {
      return await keepalive();
    } catch (error) {
      // A page mid-navigation cannot answer; assume the widget is still there
      this.log.debug({ taskId, error: (error as Error).message }, "2Captcha: keepalive failed");
      return true;
    }
  }

  private async request<T>(endpoint: string, payload: object): Promise<T> {
    try {
      return await this.transport.post<T>(endpoint, payload);
    } catch (error) {
      throw new OracleError(`2Captcha ${endpoint} request failed: ${(error as Error).message}`);
    }
  }

  /**
   * Log 2Captcha API errors with context.
   */
  private logApiError(data: ApiResponse, context: string): void {
    const errorCode = data.errorCode || "UNKNOWN";

    const errorMessages: Record<string, string> = {
      ERROR_KEY_DOES_NOT_EXIST: "API key does not exist",
      ERROR_WRONG_USER_KEY: "invalid API key",
      ERROR_ZERO_BALANCE: "zero balance — add funds",
      ERROR_NO_SLOT_AVAILABLE: "no workers available, try again later",
      ERROR_CAPTCHA_UNSOLVABLE: "captcha could not be solved",
      ERROR_IMAGE_TYPE_NOT_SUPPORTED: "image could not be processed",
      ERROR_ZERO_CAPTCHA_FILESIZE: "image is empty",
      ERROR_IP_NOT_ALLOWED: "IP address is not allowed for this key",
    };

    const message = errorMessages[errorCode] || data.errorDescription || `unknown error: ${errorCode}`;
    this.log.warn(
      { errorId: data.errorId, errorCode, errorDescription: data.errorDescription },
      `2Captcha: ${context} — ${message}`
    );
  }
}

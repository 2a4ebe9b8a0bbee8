/**
 * Slider CAPTCHA Solver
 *
 * Drives one widget through bounded solve attempts:
 *
 *   Idle → WaitingForWidget → Probing → Cropping → Submitting → Polling
 *        → Dragging → Verifying → { Solved | Retrying | Abandoned }
 *
 * Each attempt produces a typed outcome. A retryable failure optionally
 * reloads the page for a fresh widget before the next attempt; a fatal one
 * (browser gone) abandons immediately. Running out of attempts is a normal
 * negative result: the caller falls back to a human.
 */
import type { BrowserPort } from "../browser/browser-port";
import { computeDragPlan, toPageX } from "./coordinate-mapper";
import { performDrag, type RandomSource } from "./motion-simulator";
import { cropToWidget } from "./screenshot-cropper";
import {
  isVerificationHeading,
  isWidgetPresent,
  keepalive,
  probeBounds,
  probeLayout,
  waitForWidget,
} from "./widget-prober";
import { CAPTCHA, ERROR_CODES } from "../../config/constants";
import { logger as defaultLogger, type Logger } from "../../monitoring/logger";
import {
  CaptchaAttemptError,
  DragRejectedError,
  LayoutUnavailableError,
  OracleError,
  OracleSubmitFailedError,
  OracleTimeoutError,
  WidgetNotFoundError,
} from "../../shared/errors/captcha.errors";
import { sleep as defaultSleep, type Sleep } from "../../shared/utils/sleep";
import {
  SolveState,
  type CoordinateOracle,
  type CroppedWidget,
  type SliderSolveResult,
  type WidgetBounds,
} from "../../shared/types/captcha.types";

type AttemptOutcome =
  | { kind: "solved"; taskId: string }
  /** `reportIncorrect`: the failure says something about the oracle's answer */
  | { kind: "retry"; error: CaptchaAttemptError; reportIncorrect: boolean }
  | { kind: "fatal"; error: Error };

interface SolveRun {
  transitions: SolveState[];
  /** Task submitted during the current attempt */
  taskId: string | null;
}

export type CropFunction = (screenshot: Uint8Array, bounds: WidgetBounds) => Promise<CroppedWidget>;

export interface SliderCaptchaSolverOptions {
  maxAttempts?: number;
  widgetWaitTimeoutMs?: number;
  widgetWaitPollMs?: number;
  refreshWaitTimeoutMs?: number;
  postDragSettleMs?: number;
  postRefreshSettleMs?: number;
  dismissSettleMs?: number;
  crop?: CropFunction;
  random?: RandomSource;
  sleep?: Sleep;
  logger?: Logger;
}

export class SliderCaptchaSolver {
  private oracle: CoordinateOracle;
  private maxAttempts: number;
  private widgetWaitTimeoutMs: number;
  private widgetWaitPollMs: number;
  private refreshWaitTimeoutMs: number;
  private postDragSettleMs: number;
  private postRefreshSettleMs: number;
  private dismissSettleMs: number;
  private crop: CropFunction;
  private random: RandomSource;
  private sleep: Sleep;
  private log: Logger;

  constructor(oracle: CoordinateOracle, options: SliderCaptchaSolverOptions = {}) {
    this.oracle = oracle;
    this.maxAttempts = options.maxAttempts ?? CAPTCHA.MAX_ATTEMPTS;
    this.widgetWaitTimeoutMs = options.widgetWaitTimeoutMs ?? CAPTCHA.WIDGET_WAIT_TIMEOUT_MS;
    this.widgetWaitPollMs = options.widgetWaitPollMs ?? CAPTCHA.WIDGET_WAIT_POLL_MS;
    this.refreshWaitTimeoutMs = options.refreshWaitTimeoutMs ?? CAPTCHA.REFRESH_WIDGET_WAIT_TIMEOUT_MS;
    this.postDragSettleMs = options.postDragSettleMs ?? CAPTCHA.POST_DRAG_SETTLE_MS;
    this.postRefreshSettleMs = options.postRefreshSettleMs ?? CAPTCHA.POST_REFRESH_SETTLE_MS;
    this.dismissSettleMs = options.dismissSettleMs ?? CAPTCHA.MODAL_DISMISS_SETTLE_MS;
    this.crop = options.crop ?? ((screenshot, bounds) => cropToWidget(screenshot, bounds));
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? defaultLogger;
  }

  async solve(port: BrowserPort): Promise<SliderSolveResult> {
    const run: SolveRun = { transitions: [SolveState.Idle], taskId: null };

    this.enter(run, SolveState.WaitingForWidget);
    await this.awaitInitialWidget(port);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      run.taskId = null;
      this.log.info({ attempt, maxAttempts: this.maxAttempts }, "Auto-solving CAPTCHA");

      const outcome = await this.attempt(port, run);

      if (outcome.kind === "solved") {
        await this.oracle.report(outcome.taskId, true);
        this.enter(run, SolveState.Solved);
        this.log.info({ attempt }, "CAPTCHA solved automatically");
        return { solved: true, attempts: attempt, transitions: run.transitions };
      }

      if (outcome.kind === "fatal") {
        this.log.error({ attempt, error: outcome.error.message }, "Browser lost during CAPTCHA solve");
        this.enter(run, SolveState.Abandoned);
        return { solved: false, attempts: attempt, transitions: run.transitions };
      }

      this.log.warn(
        { attempt, code: outcome.error.code, error: outcome.error.message },
        "CAPTCHA attempt failed"
      );
      if (outcome.reportIncorrect && run.taskId) {
        await this.oracle.report(run.taskId, false);
      }

      this.enter(run, SolveState.Retrying);
      if (outcome.error.refreshWidget) {
        await this.refreshWidget(port);
      }
    }

    this.log.warn({ attempts: this.maxAttempts }, "Auto-solve failed after all attempts");
    this.enter(run, SolveState.Abandoned);
    return { solved: false, attempts: this.maxAttempts, transitions: run.transitions };
  }

  /**
   * Per-attempt boundary: anything thrown becomes a retry, unless the
   * browser itself is gone.
   */
  private async attempt(port: BrowserPort, run: SolveRun): Promise<AttemptOutcome> {
    try {
      return await this.runAttempt(port, run);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      if (!port.isConnected()) {
        return { kind: "fatal", error: cause };
      }
      const attemptError =
        cause instanceof CaptchaAttemptError
          ? cause
          : new CaptchaAttemptError(`Auto-solve error: ${cause.message}`, ERROR_CODES.UNKNOWN);
      return { kind: "retry", error: attemptError, reportIncorrect: false };
    }
  }

  private async runAttempt(port: BrowserPort, run: SolveRun): Promise<AttemptOutcome> {
    await this.dismissOverlays(port);

    this.enter(run, SolveState.Probing);
    const bounds = await probeBounds(port);
    if (!bounds) {
      return retry(new WidgetNotFoundError("No CAPTCHA elements found"));
    }

    this.enter(run, SolveState.Cropping);
    const cropped = await this.crop(await port.screenshot(), bounds);

    this.enter(run, SolveState.Submitting);
    const taskId = await this.oracle.submit(cropped.base64);
    if (!taskId) {
      return retry(new OracleSubmitFailedError());
    }
    run.taskId = taskId;

    this.enter(run, SolveState.Polling);
    const result = await this.oracle.poll(taskId, () => keepalive(port));
    if (result.status === "expired") {
      return retry(new OracleTimeoutError("CAPTCHA expired while waiting for 2Captcha"));
    }
    if (result.status === "timeout") {
      return retry(new OracleTimeoutError());
    }
    if (result.status === "failed") {
      return retry(new OracleError(`2Captcha poll error: ${result.reason}`));
    }

    const [target] = result.coordinates;
    if (!target) {
      return retry(new OracleError("2Captcha returned no coordinates"));
    }

    // The answer can arrive long after the last keepalive
    if (!(await isWidgetPresent(port))) {
      return retry(new WidgetNotFoundError("CAPTCHA expired before the answer arrived"));
    }

    this.enter(run, SolveState.Dragging);
    const layout = await probeLayout(port);
    if (!layout) {
      return retry(new LayoutUnavailableError());
    }

    const pageX = toPageX(target.x, cropped.rect);
    const plan = computeDragPlan(pageX, layout);
    this.log.info(
      {
        cropX: target.x,
        cropY: target.y,
        pageX,
        slotCenter: Math.round(plan.slotCenter),
        pieceWidth: layout.pieceWidth,
        distance: Math.round(plan.distance),
        maxDistance: plan.maxDistance,
      },
      "Dragging slider"
    );

    if (!(await performDrag(port, plan.distance, this.random))) {
      return retry(new DragRejectedError("Slider handle missing, drag not started"));
    }
    await this.sleep(this.postDragSettleMs);

    this.enter(run, SolveState.Verifying);
    const { heading } = await port.run("readIndicator");
    if (isVerificationHeading(heading)) {
      return retry(new DragRejectedError("Solution rejected"));
    }
    return { kind: "solved", taskId };
  }

  /**
   * First wait for the widget. The attempts run whatever happens here: a
   * page still redirecting can throw before the widget exists.
   */
  private async awaitInitialWidget(port: BrowserPort): Promise<void> {
    try {
      const appeared = await this.waitForWidget(port, this.widgetWaitTimeoutMs);
      if (!appeared) {
        this.log.info("CAPTCHA widget did not appear in time");
      }
    } catch (error) {
      this.log.warn({ error: (error as Error).message }, "CAPTCHA widget wait failed");
    }
  }

  /**
   * Reload for a fresh widget. Failures are logged; the next attempt will
   * find out whether the page is usable.
   */
  private async refreshWidget(port: BrowserPort): Promise<void> {
    try {
      await port.reload();
      await this.sleep(this.postRefreshSettleMs);
      await this.dismissOverlays(port);
      await this.waitForWidget(port, this.refreshWaitTimeoutMs);
    } catch (error) {
      this.log.warn({ error: (error as Error).message }, "CAPTCHA refresh failed");
    }
  }

  /** Fire-and-forget cleanup of modals covering the widget */
  private async dismissOverlays(port: BrowserPort): Promise<void> {
    try {
      const clicked = await port.run("dismissOverlays");
      if (clicked > 0) {
        this.log.debug({ clicked }, "Dismissed overlays");
      }
    } catch (error) {
      this.log.debug({ error: (error as Error).message }, "Overlay dismissal skipped");
    }
    await this.sleep(this.dismissSettleMs);
  }

  private waitForWidget(port: BrowserPort, timeoutMs: number): Promise<boolean> {
    return waitForWidget(port, { timeoutMs, pollMs: this.widgetWaitPollMs, sleep: this.sleep });
  }

  private enter(run: SolveRun, state: SolveState): void {
    run.transitions.push(state);
    this.log.debug({ state }, "CAPTCHA solver state");
  }
}

function retry(error: CaptchaAttemptError): AttemptOutcome {
  return { kind: "retry", error, reportIncorrect: true };
}

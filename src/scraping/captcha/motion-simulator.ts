/**
 * Motion Simulator
 *
 * Human-like slider drag: quadratic ease-out from the handle's center to
 * center + distance, 30-44 pointer moves, up to a pixel of vertical jitter
 * per move. The path is planned here and replayed inside the page.
 */
import type { BrowserPort } from "../browser/browser-port";
import { CAPTCHA } from "../../config/constants";
import type { DragPath, PointerOffset } from "../../shared/types/captcha.types";

export type RandomSource = () => number;

export function easeOutQuad(progress: number): number {
  return 1 - Math.pow(1 - progress, 2);
}

export function planDragPath(distance: number, random: RandomSource = Math.random): DragPath {
  const steps = CAPTCHA.DRAG_MIN_STEPS + Math.floor(random() * CAPTCHA.DRAG_STEP_SPREAD);
  const moves: PointerOffset[] = [];

  for (let i = 1; i <= steps; i++) {
    moves.push({
      dx: distance * easeOutQuad(i / steps),
      dy: (random() - 0.5) * 2,
    });
  }
  return { distance, moves };
}

/**
 * Perform the drag. Resolves to false when the slider handle was not on
 * the page, so the gesture never started.
 */
export function performDrag(
  port: BrowserPort,
  distance: number,
  random: RandomSource = Math.random
): Promise<boolean> {
  return port.run("drag", planDragPath(distance, random));
}

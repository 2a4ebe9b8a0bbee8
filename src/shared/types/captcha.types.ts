/**
 * Slider CAPTCHA Types
 *
 * Geometry read from the widget, values derived from it, and the results
 * exchanged between the oracle client and the solver.
 * All coordinates are viewport CSS pixels unless noted otherwise.
 */

/** Bounding box covering the whole widget (puzzle container + slider) */
export interface WidgetBounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Live geometry of the widget parts needed to compute a drag.
 * Always read fresh: a refresh can replace the widget.
 */
export interface WidgetLayout {
  sliderX: number;
  sliderCenterY: number;
  sliderWidth: number;
  imageX: number;
  imageY: number;
  imageWidth: number;
  pieceWidth: number;
  trackX: number;
  trackWidth: number;
}

export interface ImageSize {
  width: number;
  height: number;
}

/** Offset of the cropped image inside the full screenshot */
export interface CropRegion {
  left: number;
  top: number;
}

/** Crop rectangle, clamped to the screenshot */
export interface CropRect extends CropRegion {
  width: number;
  height: number;
}

export interface CroppedWidget {
  /** Base64 PNG sent to the oracle */
  base64: string;
  rect: CropRect;
}

/** Horizontal travel for the slider handle */
export interface DragPlan {
  /** Target slot center, relative to the background image */
  slotCenter: number;
  rawDistance: number;
  maxDistance: number;
  /** rawDistance clamped to [0, maxDistance] */
  distance: number;
}

export interface PointerOffset {
  dx: number;
  dy: number;
}

/** Pointer moves replayed in the page, relative to the slider center */
export interface DragPath {
  distance: number;
  moves: PointerOffset[];
}

export interface OracleCoordinate {
  x: number;
  y: number;
}

export type PollOutcome =
  | { status: "ready"; coordinates: OracleCoordinate[] }
  | { status: "expired" }
  | { status: "failed"; reason: string }
  | { status: "timeout" };

/** Invoked before each poll; resolves to whether the widget is still alive */
export type KeepaliveHook = () => Promise<boolean>;

/** Remote service that locates the puzzle slot in an image */
export interface CoordinateOracle {
  submit(imageBase64: string): Promise<string | null>;
  poll(taskId: string, keepalive?: KeepaliveHook): Promise<PollOutcome>;
  /** Best-effort feedback; resolves to whether the report was delivered */
  report(taskId: string, correct: boolean): Promise<boolean>;
}

export enum SolveState {
  Idle = "Idle",
  WaitingForWidget = "WaitingForWidget",
  Probing = "Probing",
  Cropping = "Cropping",
  Submitting = "Submitting",
  Polling = "Polling",
  Dragging = "Dragging",
  Verifying = "Verifying",
  Solved = "Solved",
  Retrying = "Retrying",
  Abandoned = "Abandoned",
}

/**
 * Result of a whole solve run. Exhausting every attempt is a normal
 * negative result, not an exception.
 */
export interface SliderSolveResult {
  solved: boolean;
  attempts: number;
  /** States visited, in order */
  transitions: SolveState[];
}

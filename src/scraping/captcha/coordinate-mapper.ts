/**
 * Coordinate Mapper
 *
 * Moves points between the three spaces involved in a solve: the full
 * screenshot, the cropped image sent to 2Captcha, and the live page.
 * Pure functions only.
 *
 * The oracle's x is taken to be the center of the destination slot in
 * cropped-image space. That matches what 2Captcha workers are asked to
 * click, but it has not been checked against captured answers.
 */
import { CAPTCHA } from "../../config/constants";
import type {
  CropRect,
  CropRegion,
  DragPlan,
  ImageSize,
  WidgetBounds,
  WidgetLayout,
} from "../../shared/types/captcha.types";

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/**
 * Crop rectangle around the widget with a fixed margin, clamped to the
 * screenshot on every side. Width or height is 0 when the widget lies
 * entirely outside the image.
 */
export function computeCropRegion(
  bounds: WidgetBounds,
  image: ImageSize,
  margin: number = CAPTCHA.CROP_MARGIN_PX
): CropRect {
  const left = clamp(Math.trunc(bounds.x) - margin, 0, image.width);
  const top = clamp(Math.trunc(bounds.y) - margin, 0, image.height);
  const right = clamp(Math.trunc(bounds.x + bounds.width) + margin, left, image.width);
  const bottom = clamp(Math.trunc(bounds.y + bounds.height) + margin, top, image.height);

  return { left, top, width: right - left, height: bottom - top };
}

/** Cropped-image x back to page x */
export function toPageX(cropX: number, region: CropRegion): number {
  return cropX + region.left;
}

/**
 * The slider track is sometimes rendered narrower than the background
 * image; the image's extent is the real travel range then.
 */
export function normalizeLayout(layout: WidgetLayout): WidgetLayout {
  if (layout.trackWidth >= layout.imageWidth) return layout;
  return { ...layout, trackX: layout.imageX, trackWidth: layout.imageWidth };
}

/**
 * Distance the slider handle must travel so the piece's center lands on
 * `targetPageX`, clamped to [0, trackWidth - sliderWidth].
 */
export function computeDragPlan(targetPageX: number, layout: WidgetLayout): DragPlan {
  const slotCenter = targetPageX - layout.imageX;
  const rawDistance = slotCenter - layout.pieceWidth / 2;
  const maxDistance = layout.trackWidth - layout.sliderWidth;
  const distance = Math.max(0, Math.min(rawDistance, maxDistance));

  return { slotCenter, rawDistance, maxDistance, distance };
}

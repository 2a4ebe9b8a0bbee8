/**
 * Screenshot Cropper
 *
 * Cuts the widget out of a viewport screenshot so 2Captcha workers see only
 * the puzzle, and so the returned x maps back to the page with a single
 * offset.
 */
import sharp from "sharp";
import { computeCropRegion } from "./coordinate-mapper";
import { CAPTCHA } from "../../config/constants";
import { WidgetNotFoundError } from "../../shared/errors/captcha.errors";
import type { CroppedWidget, WidgetBounds } from "../../shared/types/captcha.types";

export async function cropToWidget(
  screenshot: Uint8Array,
  bounds: WidgetBounds,
  margin: number = CAPTCHA.CROP_MARGIN_PX
): Promise<CroppedWidget> {
  const { width, height } = await sharp(screenshot).metadata();
  if (!width || !height) {
    throw new WidgetNotFoundError("Screenshot has no readable dimensions");
  }

  const rect = computeCropRegion(bounds, { width, height }, margin);
  if (rect.width === 0 || rect.height === 0) {
    throw new WidgetNotFoundError("CAPTCHA widget lies outside the screenshot");
  }

  const png = await sharp(screenshot)
    .extract({ left: rect.left, top: rect.top, width: rect.width, height: rect.height })
    .png()
    .toBuffer();

  return { base64: png.toString("base64"), rect };
}

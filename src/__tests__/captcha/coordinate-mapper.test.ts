import { describe, it, expect } from "vitest";
import {
  computeCropRegion,
  computeDragPlan,
  normalizeLayout,
  toPageX,
} from "../../scraping/captcha/coordinate-mapper";
import type { WidgetLayout } from "../../shared/types/captcha.types";

const IMAGE = { width: 1280, height: 720 };

function layout(overrides: Partial<WidgetLayout> = {}): WidgetLayout {
  return {
    sliderX: 50,
    sliderCenterY: 300,
    sliderWidth: 40,
    imageX: 50,
    imageY: 100,
    imageWidth: 300,
    pieceWidth: 40,
    trackX: 50,
    trackWidth: 300,
    ...overrides,
  };
}

describe("computeCropRegion", () => {
  it("adds a 10px margin around the widget", () => {
    const rect = computeCropRegion({ x: 100, y: 200, width: 300, height: 150 }, IMAGE, 10);
    expect(rect).toEqual({ left: 90, top: 190, width: 320, height: 170 });
  });

  it("clamps the origin at zero near the top-left corner", () => {
    const rect = computeCropRegion({ x: 4, y: 6, width: 100, height: 50 }, IMAGE, 10);
    expect(rect).toEqual({ left: 0, top: 0, width: 114, height: 66 });
  });

  it("clamps the far edges to the screenshot", () => {
    const rect = computeCropRegion({ x: 1200, y: 650, width: 300, height: 150 }, IMAGE, 10);
    expect(rect).toEqual({ left: 1190, top: 640, width: 90, height: 80 });
  });

  it("truncates fractional bounds", () => {
    const rect = computeCropRegion({ x: 100.7, y: 200.2, width: 299.9, height: 150.5 }, IMAGE, 10);
    expect(rect).toEqual({ left: 90, top: 190, width: 320, height: 170 });
  });

  it("yields an empty rectangle for a widget outside the image", () => {
    const rect = computeCropRegion({ x: 2000, y: 100, width: 300, height: 150 }, IMAGE, 10);
    expect(rect.width).toBe(0);
    expect(rect.left).toBe(1280);
  });

  it("always stays within the image", () => {
    const samples = [
      { x: -50, y: -50, width: 40, height: 40 },
      { x: 0, y: 0, width: 1280, height: 720 },
      { x: 640, y: 360, width: 2000, height: 2000 },
      { x: 1275, y: 715, width: 3, height: 3 },
      { x: -500, y: 300, width: 100, height: 100 },
    ];
    for (const bounds of samples) {
      const rect = computeCropRegion(bounds, IMAGE, 10);
      expect(rect.left).toBeGreaterThanOrEqual(0);
      expect(rect.top).toBeGreaterThanOrEqual(0);
      expect(rect.width).toBeGreaterThanOrEqual(0);
      expect(rect.height).toBeGreaterThanOrEqual(0);
      expect(rect.left + rect.width).toBeLessThanOrEqual(IMAGE.width);
      expect(rect.top + rect.height).toBeLessThanOrEqual(IMAGE.height);
    }
  });
});

describe("toPageX", () => {
  it("adds the crop offset", () => {
    expect(toPageX(150, { left: 90, top: 190 })).toBe(240);
    expect(toPageX(0, { left: 0, top: 0 })).toBe(0);
    expect(toPageX(12.5, { left: 90, top: 190 })).toBe(102.5);
  });
});

describe("normalizeLayout", () => {
  it("keeps a track at least as wide as the image", () => {
    const original = layout({ trackX: 45, trackWidth: 310 });
    expect(normalizeLayout(original)).toBe(original);
  });

  it("falls back to the image extent for a narrow track", () => {
    const normalized = normalizeLayout(layout({ trackX: 60, trackWidth: 200 }));
    expect(normalized.trackX).toBe(50);
    expect(normalized.trackWidth).toBe(300);
  });
});

describe("computeDragPlan", () => {
  it("centers the piece on the slot", () => {
    const plan = computeDragPlan(150, layout());
    expect(plan).toEqual({ slotCenter: 100, rawDistance: 80, maxDistance: 260, distance: 80 });
  });

  it("clamps a target left of the image to zero", () => {
    const plan = computeDragPlan(40, layout());
    expect(plan.rawDistance).toBe(-30);
    expect(plan.distance).toBe(0);
  });

  it("clamps a target past the track end", () => {
    const plan = computeDragPlan(900, layout());
    expect(plan.distance).toBe(260);
  });

  it("stays within [0, trackWidth - sliderWidth]", () => {
    for (const target of [-1000, 0, 50, 69, 70, 200, 330, 331, 5000]) {
      const plan = computeDragPlan(target, layout());
      expect(plan.distance).toBeGreaterThanOrEqual(0);
      expect(plan.distance).toBeLessThanOrEqual(260);
    }
  });
});

/**
 * Viewport math for showing the user's position on a plan
 */

import { DEFAULT_VIEWPORT_OPTIONS } from '../config.js';
import type { PixelPoint, ViewportOptions } from '../types.js';

/** Above this speed the GPS course is trusted over the magnetometer */
export const GPS_HEADING_MIN_SPEED = 1.0;

export interface ViewportSize {
  width: number;
  height: number;
}

export interface FocusRequest {
  /** Native plan pixel to center on */
  target: PixelPoint;

  viewport: ViewportSize;

  /** Zoom currently applied to the displayed plan */
  currentScale: number;

  /** Plan pixels per meter, or null when unavailable */
  pixelsPerMeter: number | null;

  /** Choose a zoom showing `visibleMeters` across the viewport */
  fitDistance?: boolean;
}

/** Display transform: screen = translate + scale · content */
export interface FocusTransform {
  scale: number;
  translateX: number;
  translateY: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Transform that puts `target` at the center of the viewport
 *
 * Keeps the current zoom unless `fitDistance` is set and a scale is known.
 */
export function computeFocusTransform(
  request: FocusRequest,
  options: ViewportOptions = DEFAULT_VIEWPORT_OPTIONS
): FocusTransform {
  const { target, viewport, pixelsPerMeter } = request;
  let scale = request.currentScale;

  if (request.fitDistance && pixelsPerMeter !== null) {
    const requiredDisplayPixels = options.visibleMeters * pixelsPerMeter * options.displayScale;
    if (requiredDisplayPixels > 0) {
      scale = clamp(viewport.width / requiredDisplayPixels, options.minScale, options.maxScale);
    }
  }

  const contentX = target.x * options.displayScale;
  const contentY = target.y * options.displayScale;

  return {
    scale,
    translateX: viewport.width / 2 - contentX * scale,
    translateY: viewport.height / 2 - contentY * scale,
  };
}

export interface HeadingInput {
  /** Pixel-space angle of north, radians */
  northAngle: number;

  /** Compass heading, degrees clockwise from north */
  magnetometerHeading: number;

  /** GPS course over ground, degrees clockwise from north */
  gpsHeading: number;

  /** Ground speed, m/s */
  speed: number;
}

/**
 * Rotation (radians) for a direction marker drawn pointing up when unrotated
 */
export function headingMarkerRotation(input: HeadingInput): number {
  const heading = input.speed > GPS_HEADING_MIN_SPEED ? input.gpsHeading : input.magnetometerHeading;
  return input.northAngle + heading * (Math.PI / 180) + Math.PI / 2;
}

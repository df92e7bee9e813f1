/**
 * Perspective Projection
 *
 * Pure functions mapping a track-relative (lateral offset, forward distance)
 * pair onto the screen. Depth comes from a reciprocal divide,
 * scale = d / (d + z), which is 1 at the camera and converges on the
 * vanishing line as z grows.
 *
 * Callers filter geometry behind the camera before projecting. Anything that
 * still arrives out of domain is a programming error: strict mode throws,
 * release mode clamps and carries on.
 */

import type { ProjectedPoint, TrackSegment, Viewport } from './types';
import { InvalidArgumentError } from './errors';

/** Floor for cameraDepth when clamping in release mode. */
const MIN_CAMERA_DEPTH = 1e-6;

/** Everything project() needs besides the point itself. */
export interface CameraParams {
  readonly cameraDepth: number;
  /** Screen pixels from lane centre to lane edge at scale 1 */
  readonly laneHalfWidth: number;
  readonly screenCenterX: number;
  readonly horizonY: number;
  readonly screenHeight: number;
  /** Throw InvalidArgumentError instead of clamping */
  readonly strict: boolean;
}

/** Build camera parameters for a viewport. */
export function cameraForViewport(
  viewport: Viewport,
  cameraDepth: number,
  laneHalfWidth: number,
  strict = false,
): CameraParams {
  return {
    cameraDepth,
    laneHalfWidth,
    screenCenterX: viewport.width / 2,
    horizonY: viewport.horizonY,
    screenHeight: viewport.height,
    strict,
  };
}

/**
 * Perspective shrink factor for a point `forwardDistance` rows ahead.
 * In (0, 1] and strictly decreasing in forwardDistance.
 */
export function perspectiveScale(forwardDistance: number, cameraDepth: number, strict = false): number {
  let z = forwardDistance;
  let d = cameraDepth;

  if (!(Number.isFinite(z) && z >= 0)) {
    if (strict) {
      throw new InvalidArgumentError(`forwardDistance must be a finite number >= 0, got ${forwardDistance}`);
    }
    z = z === Infinity ? Number.MAX_VALUE : 0;
  }
  if (!(Number.isFinite(d) && d > 0)) {
    if (strict) {
      throw new InvalidArgumentError(`cameraDepth must be a finite number > 0, got ${cameraDepth}`);
    }
    d = MIN_CAMERA_DEPTH;
  }

  return d / (d + z);
}

/**
 * Project a point onto the screen.
 *
 * @param lateralOffset - Lane units from the lane centre
 * @param forwardDistance - Rows ahead of the camera (>= 0)
 * @param camera - Camera and screen parameters
 * @param curveOffset - Accumulated curve drift at this distance, in lane units
 */
export function project(
  lateralOffset: number,
  forwardDistance: number,
  camera: CameraParams,
  curveOffset = 0,
): ProjectedPoint {
  const scale = perspectiveScale(forwardDistance, camera.cameraDepth, camera.strict);
  return {
    screenX: camera.screenCenterX + (lateralOffset + curveOffset) * camera.laneHalfWidth * scale,
    screenY: camera.horizonY + scale * (camera.screenHeight - camera.horizonY),
    scale,
  };
}

/**
 * Lateral drift of the lane centre at an absolute distance, accumulated over
 * the window: full `curvature * length` of every segment that ends before
 * `distance`, plus the partial drift inside the segment containing it.
 *
 * Segments must be ordered by startDistance. Distances before the first
 * segment have zero drift; beyond the last, the drift stays at its final value.
 */
export function curveDrift(segments: readonly TrackSegment[], distance: number): number {
  let drift = 0;
  for (const seg of segments) {
    if (distance <= seg.startDistance) break;
    const travelled = Math.min(seg.length, distance - seg.startDistance);
    drift += seg.curvature * travelled;
  }
  return drift;
}

/**
 * Drift relative to the camera. Subtracting the camera's own drift keeps the
 * road anchored under the player and stops pruned segments from shifting it.
 */
export function relativeCurveDrift(
  segments: readonly TrackSegment[],
  distance: number,
  cameraPosition: number,
): number {
  return curveDrift(segments, distance) - curveDrift(segments, cameraPosition);
}

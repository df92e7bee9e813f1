/**
 * Perspective Projection Tests
 *
 * perspectiveScale range and monotonicity, screen mapping, domain guards in
 * strict and release mode, and running curve drift across segment boundaries.
 */

import { describe, it, expect } from 'vitest';
import {
  cameraForViewport,
  curveDrift,
  perspectiveScale,
  project,
  relativeCurveDrift,
} from '../../src/engine/projection';
import { InvalidArgumentError } from '../../src/engine/errors';
import type { TrackSegment } from '../../src/engine/types';

// --- Helpers ---

function segment(id: number, startDistance: number, length: number, curvature: number): TrackSegment {
  return { id, startDistance, length, curvature, widthAtStart: 1.25, colorThemeIndex: 0 };
}

const camera = cameraForViewport({ width: 1000, height: 800, horizonY: 200 }, 2, 100);

// --- perspectiveScale ---

describe('perspectiveScale', () => {
  it('is 1 at the camera', () => {
    expect(perspectiveScale(0, 3)).toBe(1);
  });

  it('halves at forwardDistance = cameraDepth', () => {
    expect(perspectiveScale(3, 3)).toBeCloseTo(0.5, 10);
  });

  it('stays in (0, 1] and strictly decreases with distance', () => {
    const distances = [0, 0.01, 0.5, 1, 2, 10, 100, 1e4, 1e8];
    for (const d of [0.5, 1, 3, 50]) {
      let previous = Infinity;
      for (const z of distances) {
        const s = perspectiveScale(z, d);
        expect(s).toBeGreaterThan(0);
        expect(s).toBeLessThanOrEqual(1);
        expect(s).toBeLessThan(previous);
        previous = s;
      }
    }
  });

  it('approaches 0 far away', () => {
    expect(perspectiveScale(1e9, 2)).toBeLessThan(1e-8);
  });

  describe('strict mode', () => {
    it('throws InvalidArgumentError for negative distance', () => {
      expect(() => perspectiveScale(-1, 3, true)).toThrow(InvalidArgumentError);
    });

    it('throws InvalidArgumentError for non-positive camera depth', () => {
      expect(() => perspectiveScale(1, 0, true)).toThrow(InvalidArgumentError);
      expect(() => perspectiveScale(1, -2, true)).toThrow(InvalidArgumentError);
    });

    it('throws InvalidArgumentError for NaN', () => {
      expect(() => perspectiveScale(NaN, 3, true)).toThrow(InvalidArgumentError);
    });
  });

  describe('release mode', () => {
    it('clamps negative and NaN distance to the camera plane', () => {
      expect(perspectiveScale(-5, 3)).toBe(1);
      expect(perspectiveScale(NaN, 3)).toBe(1);
    });

    it('keeps infinite distance positive and tiny', () => {
      const s = perspectiveScale(Infinity, 3);
      expect(s).toBeGreaterThan(0);
      expect(s).toBeLessThan(1e-300);
    });

    it('floors a zero camera depth instead of dividing by zero', () => {
      const s = perspectiveScale(1, 0);
      expect(s).toBeGreaterThan(0);
      expect(s).toBeLessThan(1e-5);
    });
  });
});

// --- project ---

describe('project', () => {
  it('maps the camera plane on the lane centre to the bottom middle', () => {
    const p = project(0, 0, camera);
    expect(p.screenX).toBe(500);
    expect(p.screenY).toBe(800);
    expect(p.scale).toBe(1);
  });

  it('scales lateral offset and height by the perspective factor', () => {
    // scale = 2 / (2 + 2) = 0.5
    const p = project(1, 2, camera);
    expect(p.scale).toBeCloseTo(0.5, 10);
    expect(p.screenX).toBeCloseTo(550, 10);
    expect(p.screenY).toBeCloseTo(500, 10);
  });

  it('adds curve offset in lane units', () => {
    const p = project(1, 2, camera, 0.5);
    expect(p.screenX).toBeCloseTo(575, 10);
  });

  it('converges on the vanishing point as distance grows', () => {
    const p = project(1, 1e9, camera, 3);
    expect(p.screenX).toBeCloseTo(500, 4);
    expect(p.screenY).toBeCloseTo(200, 4);
  });

  it('moves up the screen as distance grows', () => {
    let previousY = Infinity;
    for (const z of [0, 1, 2, 5, 20, 80]) {
      const { screenY } = project(0, z, camera);
      expect(screenY).toBeLessThan(previousY);
      expect(screenY).toBeGreaterThan(200);
      previousY = screenY;
    }
  });

  it('throws for negative distance with a strict camera', () => {
    const strict = cameraForViewport({ width: 1000, height: 800, horizonY: 200 }, 2, 100, true);
    expect(() => project(0, -0.1, strict)).toThrow(InvalidArgumentError);
  });
});

// --- curveDrift ---

describe('curveDrift', () => {
  const segments = [
    segment(0, 0, 10, 0),
    segment(1, 10, 10, 0.1),
    segment(2, 20, 5, -0.2),
  ];

  it('is zero on a straight opening', () => {
    expect(curveDrift(segments, 5)).toBe(0);
  });

  it('accumulates partial drift inside the current segment', () => {
    expect(curveDrift(segments, 15)).toBeCloseTo(0.5, 10);
  });

  it('carries the full drift of earlier segments', () => {
    expect(curveDrift(segments, 20)).toBeCloseTo(1.0, 10);
    expect(curveDrift(segments, 22)).toBeCloseTo(0.6, 10);
  });

  it('is continuous across a segment boundary', () => {
    expect(curveDrift(segments, 20 - 1e-9)).toBeCloseTo(curveDrift(segments, 20 + 1e-9), 6);
  });

  it('holds its final value past the end of the window', () => {
    expect(curveDrift(segments, 100)).toBeCloseTo(0, 10);
  });

  it('is measured from the camera in relativeCurveDrift', () => {
    expect(relativeCurveDrift(segments, 22, 15)).toBeCloseTo(0.1, 10);
    expect(relativeCurveDrift(segments, 15, 15)).toBe(0);
  });
});

/**
 * Triangle geometry from three angles, on a relative scale where the base
 * runs from (0,0) to (1,0).
 */

import { ValidationError } from '@tally/shared/Types/errors.js';

export type Point = readonly [number, number];

export interface TriangleAngles {
  a1: number;
  a2: number;
  a3: number;
}

export interface TriangleGeometry {
  angles: TriangleAngles;
  vertices: readonly [Point, Point, Point];
  /** Side lengths: base p1p2 (always 1), p2p3, p1p3 */
  sides: readonly [number, number, number];
}

/** Smallest angle that still renders legibly */
export const MIN_DRAWABLE_ANGLE = 5;

const ANGLE_SUM_TOLERANCE = 1e-9;

export function validateAngles(angles: TriangleAngles): void {
  const { a1, a2, a3 } = angles;
  if (Math.abs(a1 + a2 + a3 - 180) > ANGLE_SUM_TOLERANCE) {
    throw new ValidationError('Invalid triangle! Angle sum of triangle must equal to 180˚.', { angles });
  }
  if (a1 <= 0 || a2 <= 0 || a3 <= 0) {
    throw new ValidationError('Invalid triangle! All angles must be bigger than 0˚.', { angles });
  }
  if (a1 < MIN_DRAWABLE_ANGLE || a2 < MIN_DRAWABLE_ANGLE || a3 < MIN_DRAWABLE_ANGLE) {
    throw new ValidationError(
      `Minimum angle accepted is ${MIN_DRAWABLE_ANGLE}˚ for the triangle to display properly.`,
      { angles },
    );
  }
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function distance(p: Point, q: Point): number {
  return Math.hypot(q[0] - p[0], q[1] - p[1]);
}

export function midpoint(p: Point, q: Point): Point {
  return [(p[0] + q[0]) / 2, (p[1] + q[1]) / 2];
}

/**
 * Place the apex by the law of sines: |p1p3| = sin(a2) / sin(a3) for a unit base.
 */
export function computeTriangle(angles: TriangleAngles): TriangleGeometry {
  validateAngles(angles);

  const a1 = toRadians(angles.a1);
  const a2 = toRadians(angles.a2);
  const a3 = toRadians(angles.a3);
  const side13 = Math.sin(a2) / Math.sin(a3);

  const p1: Point = [0, 0];
  const p2: Point = [1, 0];
  const p3: Point = [side13 * Math.cos(a1), side13 * Math.sin(a1)];

  return {
    angles,
    vertices: [p1, p2, p3],
    sides: [1, distance(p2, p3), distance(p1, p3)],
  };
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * "Relative side length: 1, 0.5, 0.87"
 */
export function describeSides(geometry: TriangleGeometry): string {
  const [, side23, side13] = geometry.sides;
  return `Relative side length: 1, ${roundTo(side23, 2)}, ${roundTo(side13, 2)}`;
}

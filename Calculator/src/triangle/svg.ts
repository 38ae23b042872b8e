/**
 * SVG export of a computed triangle: the three sides, a vertex dot and
 * angle label at each corner, and relative lengths at the side midpoints.
 */

import { writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '@tally/shared/Utils/logger.js';
import { formatDecimal } from '../format/formatter.js';
import {
  computeTriangle,
  midpoint,
  roundTo,
  type Point,
  type TriangleAngles,
  type TriangleGeometry,
} from './geometry.js';

const SCALE = 400;
const MARGIN = 40;
/** How far angle labels sit from their vertex, toward the centroid */
const LABEL_PULL = 0.22;

function fmt(n: number): string {
  return String(roundTo(n, 2));
}

export function renderTriangleSvg(geometry: TriangleGeometry): string {
  const [p1, p2, p3] = geometry.vertices;
  const xs = [p1[0], p2[0], p3[0]];
  const ys = [p1[1], p2[1], p3[1]];
  const minX = Math.min(...xs);
  const maxY = Math.max(...ys);
  const width = (Math.max(...xs) - minX) * SCALE + 2 * MARGIN;
  const height = (maxY - Math.min(...ys)) * SCALE + 2 * MARGIN;

  // SVG y grows downward
  const project = (p: Point): Point => [(p[0] - minX) * SCALE + MARGIN, (maxY - p[1]) * SCALE + MARGIN];
  const [s1, s2, s3] = [project(p1), project(p2), project(p3)];
  const centroid: Point = [(s1[0] + s2[0] + s3[0]) / 3, (s1[1] + s2[1] + s3[1]) / 3];
  const toward = (p: Point): Point => [
    p[0] + (centroid[0] - p[0]) * LABEL_PULL,
    p[1] + (centroid[1] - p[1]) * LABEL_PULL,
  ];

  const { a1, a2, a3 } = geometry.angles;
  const [base, side23, side13] = geometry.sides;

  const lines: string[] = [];
  lines.push(`<svg xmlns="http://www.w3.org/2000/svg" width="${fmt(width)}" height="${fmt(height)}" font-size="12">`);
  lines.push(
    `  <polygon points="${[s1, s2, s3].map((p) => `${fmt(p[0])},${fmt(p[1])}`).join(' ')}" fill="none" stroke="black"/>`,
  );

  for (const [point, angle] of [
    [s1, a1],
    [s2, a2],
    [s3, a3],
  ] as const) {
    lines.push(`  <circle cx="${fmt(point[0])}" cy="${fmt(point[1])}" r="3"/>`);
    const label = toward(point);
    lines.push(
      `  <text x="${fmt(label[0])}" y="${fmt(label[1])}" text-anchor="middle">${formatDecimal(angle)}°</text>`,
    );
  }

  for (const [from, to, length] of [
    [s1, s2, base],
    [s2, s3, side23],
    [s1, s3, side13],
  ] as const) {
    const mid = midpoint(from, to);
    lines.push(`  <text x="${fmt(mid[0])}" y="${fmt(mid[1])}" text-anchor="middle">${roundTo(length, 2)}</text>`);
  }

  lines.push('</svg>');
  return lines.join('\n') + '\n';
}

/**
 * Validate the angles, write the SVG and return the geometry.
 */
export async function drawTriangle(angles: TriangleAngles, outputPath: string): Promise<TriangleGeometry> {
  const geometry = computeTriangle(angles);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, renderTriangleSvg(geometry), 'utf-8');
  logger.child('triangle').debug('Triangle written', { path: outputPath, angles });
  return geometry;
}

// Shape-aware distance on the tabletop. Positions are in inches, bases in mm.

import { Injectable } from '@nestjs/common';
import type {
  Board,
  Measurement,
  Model,
  Position,
} from '../../types/index.js';
import { EngineConfigService } from '../engine-config.service.js';

const MM_PER_INCH = 25.4;
const EPSILON = 1e-6;
/** Bases may touch; only a real intersection counts as overlap. */
const OVERLAP_TOLERANCE = 0.01;

function centerDistance(a: Position, b: Position): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/** Radius of the base edge in the given direction (radians, board frame). */
export function baseRadiusToward(model: Model, direction: number): number {
  const minor = model.base_mm / 2 / MM_PER_INCH;
  if (model.base_type === 'circular' || model.base_length_mm === undefined) {
    return minor;
  }
  const major = model.base_length_mm / 2 / MM_PER_INCH;
  const rel = direction - (model.rotation * Math.PI) / 180;
  const denom = Math.hypot(minor * Math.cos(rel), major * Math.sin(rel));
  return denom === 0 ? minor : (major * minor) / denom;
}

@Injectable()
export class MeasurementService implements Measurement {
  constructor(private readonly configService: EngineConfigService) {}

  /** Signed edge-to-edge gap; negative when the bases intersect. */
  gap(a: Model, b: Model): number {
    if (!a.position || !b.position) return Number.POSITIVE_INFINITY;
    const dx = b.position.x - a.position.x;
    const dy = b.position.y - a.position.y;
    const dir = Math.atan2(dy, dx);
    return (
      Math.hypot(dx, dy) -
      baseRadiusToward(a, dir) -
      baseRadiusToward(b, dir + Math.PI)
    );
  }

  distance(a: Model, b: Model): number {
    return Math.max(0, this.gap(a, b));
  }

  distanceToPoint(model: Model, point: Position): number {
    if (!model.position) return Number.POSITIVE_INFINITY;
    const dir = Math.atan2(point.y - model.position.y, point.x - model.position.x);
    return Math.max(
      0,
      centerDistance(model.position, point) - baseRadiusToward(model, dir),
    );
  }

  isInEngagementRange(a: Model, b: Model, rangeInches: number): boolean {
    return this.distance(a, b) <= rangeInches + EPSILON;
  }

  engagementRangeFor(a: Model, b: Model, board: Board): number {
    const config = this.configService.get();
    const elevated = board.terrain.some(
      (t) =>
        t.multi_level &&
        [a, b].some((m) => m.position !== null && this.pointInZone(m.position, t.polygon)),
    );
    return elevated
      ? config.terrainEngagementRangeInches
      : config.engagementRangeInches;
  }

  /** Ray casting; points on the boundary count as inside. */
  pointInZone(point: Position, polygon: Position[]): boolean {
    if (polygon.length < 3) return false;
    let inside = false;
    for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
      const pi = polygon[i];
      const pj = polygon[j];
      if (onSegment(point, pj, pi)) return true;
      const crosses =
        pi.y > point.y !== pj.y > point.y &&
        point.x < ((pj.x - pi.x) * (point.y - pi.y)) / (pj.y - pi.y) + pi.x;
      if (crosses) inside = !inside;
    }
    return inside;
  }

  modelsOverlap(a: Model, b: Model): boolean {
    return this.gap(a, b) < -OVERLAP_TOLERANCE;
  }
}

function onSegment(p: Position, a: Position, b: Position): boolean {
  const cross = (p.y - a.y) * (b.x - a.x) - (p.x - a.x) * (b.y - a.y);
  if (Math.abs(cross) > EPSILON) return false;
  return (
    p.x >= Math.min(a.x, b.x) - EPSILON &&
    p.x <= Math.max(a.x, b.x) + EPSILON &&
    p.y >= Math.min(a.y, b.y) - EPSILON &&
    p.y <= Math.max(a.y, b.y) + EPSILON
  );
}

/**
 * Saved Plans
 *
 * A saved plan pairs a plan file with its calibration so it can be reopened
 * without calibrating again. Records are kept as a JSON array in one file.
 *
 * Wire format per record (flat numeric fields):
 *   id, name, filePath, lastOpened (ISO 8601)
 *   gpsN_x = latitude, gpsN_y = longitude, pdfN_x, pdfN_y   for N = 1..3
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger } from '../utils/logger.js';
import { PersistenceError } from '../utils/errors.js';
import type { TransformEngine } from '../engine/transform-engine.js';
import type { Calibration, CalibrationPair, SavedPlan } from '../types.js';

const logger = createLogger('plan-store');

export interface SavedPlanRecord {
  id: string;
  name: string;
  filePath: string;
  gps1_x: number;
  gps1_y: number;
  pdf1_x: number;
  pdf1_y: number;
  gps2_x: number;
  gps2_y: number;
  pdf2_x: number;
  pdf2_y: number;
  gps3_x: number;
  gps3_y: number;
  pdf3_x: number;
  pdf3_y: number;
  lastOpened: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new PersistenceError(`Saved plan field "${key}" must be a string`, { key, value });
  }
  return value;
}

function readNumber(record: Record<string, unknown>, key: string, fallback?: number): number {
  const value = record[key];
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback;
    throw new PersistenceError(`Saved plan field "${key}" is missing`, { key });
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new PersistenceError(`Saved plan field "${key}" must be a number`, { key, value });
  }
  return value;
}

function readPair(record: Record<string, unknown>, n: 1 | 2 | 3, fallback?: number): CalibrationPair {
  return {
    world: {
      latitude: readNumber(record, `gps${n}_x`, fallback),
      longitude: readNumber(record, `gps${n}_y`, fallback),
    },
    pixel: {
      x: readNumber(record, `pdf${n}_x`, fallback),
      y: readNumber(record, `pdf${n}_y`, fallback),
    },
  };
}

/**
 * Encode a saved plan to its wire record
 */
export function toRecord(plan: SavedPlan): SavedPlanRecord {
  const [p1, p2, p3] = plan.calibration;
  return {
    id: plan.id,
    name: plan.name,
    filePath: plan.filePath,
    gps1_x: p1.world.latitude,
    gps1_y: p1.world.longitude,
    pdf1_x: p1.pixel.x,
    pdf1_y: p1.pixel.y,
    gps2_x: p2.world.latitude,
    gps2_y: p2.world.longitude,
    pdf2_x: p2.pixel.x,
    pdf2_y: p2.pixel.y,
    gps3_x: p3.world.latitude,
    gps3_y: p3.world.longitude,
    pdf3_x: p3.pixel.x,
    pdf3_y: p3.pixel.y,
    lastOpened: plan.lastOpened.toISOString(),
  };
}

/**
 * Decode a wire record
 *
 * Records written before three-point calibration lack the third pair;
 * it decodes as zeros.
 */
export function fromRecord(value: unknown): SavedPlan {
  if (!isObject(value)) {
    throw new PersistenceError('Saved plan must be an object', { value });
  }

  const lastOpened = new Date(readString(value, 'lastOpened'));
  if (Number.isNaN(lastOpened.getTime())) {
    throw new PersistenceError('Saved plan has an invalid lastOpened date', { value });
  }

  return {
    id: readString(value, 'id'),
    name: readString(value, 'name'),
    filePath: readString(value, 'filePath'),
    calibration: [readPair(value, 1), readPair(value, 2), readPair(value, 3, 0)],
    lastOpened,
  };
}

/**
 * Capture the engine's calibration as a saved plan
 */
export function planFromEngine(
  engine: TransformEngine,
  meta: { id: string; name: string; filePath: string; lastOpened?: Date }
): SavedPlan {
  const calibration = engine.calibration;
  if (!calibration) {
    throw new PersistenceError('Calibrate the plan before saving it', { id: meta.id });
  }

  return {
    id: meta.id,
    name: meta.name,
    filePath: meta.filePath,
    calibration,
    lastOpened: meta.lastOpened ?? new Date(),
  };
}

/**
 * Load a saved plan's calibration into an engine
 */
export function restorePlan(engine: TransformEngine, plan: SavedPlan): void {
  const calibration: Calibration = plan.calibration;
  engine.setCalibration(...calibration);
  logger.info({ id: plan.id, name: plan.name }, 'Restored plan calibration');
}

/**
 * JSON file repository of saved plans
 */
export class PlanStore {
  constructor(private readonly filePath: string) {}

  /**
   * All saved plans, most recently opened first
   */
  async list(): Promise<SavedPlan[]> {
    const plans = await this.read();
    return plans.sort((a, b) => b.lastOpened.getTime() - a.lastOpened.getTime());
  }

  async get(id: string): Promise<SavedPlan | undefined> {
    const plans = await this.read();
    return plans.find((plan) => plan.id === id);
  }

  /**
   * Insert or update a plan
   *
   * Replaces any record with the same id or the same plan file.
   */
  async save(plan: SavedPlan): Promise<void> {
    const plans = (await this.read()).filter(
      (existing) => existing.id !== plan.id && existing.filePath !== plan.filePath
    );
    plans.push(plan);

    await this.write(plans);
    logger.info({ id: plan.id, name: plan.name, total: plans.length }, 'Saved plan');
  }

  /**
   * @returns Whether a plan was removed
   */
  async delete(id: string): Promise<boolean> {
    const plans = await this.read();
    const remaining = plans.filter((plan) => plan.id !== id);
    if (remaining.length === plans.length) return false;

    await this.write(remaining);
    logger.info({ id, total: remaining.length }, 'Deleted plan');
    return true;
  }

  private async read(): Promise<SavedPlan[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isObject(error) && error.code === 'ENOENT') {
        logger.debug({ filePath: this.filePath }, 'No saved plans found');
        return [];
      }
      throw new PersistenceError(`Failed to read saved plans: ${this.filePath}`, { error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new PersistenceError(`Saved plans file is not valid JSON: ${this.filePath}`, { error });
    }

    if (!Array.isArray(parsed)) {
      throw new PersistenceError(`Saved plans file must hold an array: ${this.filePath}`);
    }

    const plans = parsed.map(fromRecord);
    logger.debug({ filePath: this.filePath, count: plans.length }, 'Loaded saved plans');
    return plans;
  }

  private async write(plans: SavedPlan[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(plans.map(toRecord), null, 2));
    } catch (error) {
      throw new PersistenceError(`Failed to write saved plans: ${this.filePath}`, { error });
    }
  }
}

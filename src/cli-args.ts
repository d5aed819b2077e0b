/**
 * Command line argument parsing for the plan-locator CLI
 */

import { projectToGeo } from './transform/projection.js';
import type { GeoPoint } from './types.js';

export type Command = 'list' | 'calibrate' | 'locate' | 'pixel' | 'info' | 'delete';

const COMMANDS: readonly Command[] = ['list', 'calibrate', 'locate', 'pixel', 'info', 'delete'];

export interface CLIOptions {
  command?: Command;
  store?: string;
  id?: string;
  name?: string;
  file?: string;
  points: string[];
  lat?: number;
  lng?: number;
  epsg?: number;
  easting?: number;
  northing?: number;
  x?: number;
  y?: number;
  verbose?: boolean;
  help?: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function requireValue<T>(value: T | undefined, flag: string): T {
  if (value === undefined || (typeof value === 'number' && Number.isNaN(value))) {
    throw new UsageError(`${flag} is required`);
  }
  return value;
}

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = { points: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--store':
        options.store = next;
        i++;
        break;
      case '--id':
        options.id = next;
        i++;
        break;
      case '--name':
        options.name = next;
        i++;
        break;
      case '--file':
        options.file = next;
        i++;
        break;
      case '--point':
        options.points.push(requireValue(next, '--point'));
        i++;
        break;
      case '--lat':
        options.lat = parseFloat(next);
        i++;
        break;
      case '--lng':
        options.lng = parseFloat(next);
        i++;
        break;
      case '--epsg':
        options.epsg = parseInt(next, 10);
        i++;
        break;
      case '--easting':
        options.easting = parseFloat(next);
        i++;
        break;
      case '--northing':
        options.northing = parseFloat(next);
        i++;
        break;
      case '--x':
        options.x = parseFloat(next);
        i++;
        break;
      case '--y':
        options.y = parseFloat(next);
        i++;
        break;
      case '-v':
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        if (options.command === undefined && isCommand(arg)) {
          options.command = arg;
        }
    }
  }

  return options;
}

/**
 * Resolve a GPS position from either lat/lng or projected coordinates
 */
export function toGeoPoint(a: number, b: number, epsg: number | undefined): GeoPoint {
  return epsg === undefined ? { latitude: a, longitude: b } : projectToGeo(a, b, epsg);
}

/**
 * Parse a "--point a,b,x,y" value
 */
export function parsePoint(value: string, epsg?: number): { world: GeoPoint; pixel: { x: number; y: number } } {
  const parts = value.split(',').map((part) => parseFloat(part.trim()));
  if (parts.length !== 4 || parts.some((part) => Number.isNaN(part))) {
    throw new UsageError(`Invalid --point "${value}", expected four comma-separated numbers`);
  }
  const [a, b, x, y] = parts;
  return { world: toGeoPoint(a, b, epsg), pixel: { x, y } };
}

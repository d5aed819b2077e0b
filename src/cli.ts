#!/usr/bin/env node
/**
 * Plan Locator CLI
 *
 * Calibrate saved plans and query positions on them from the command line.
 */

import { randomUUID } from 'crypto';
import { createDefaultConfig } from './config.js';
import { CalibrationCollector } from './calibration/collector.js';
import { TransformEngine } from './engine/transform-engine.js';
import { PlanStore, planFromEngine, restorePlan } from './persistence/plan-store.js';
import { parseArgs, requireValue, toGeoPoint, parsePoint, UsageError, type CLIOptions } from './cli-args.js';
import { PlanLocatorError } from './utils/errors.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import type { SavedPlan } from './types.js';

const logger = createLogger('cli');

const HELP_TEXT = `
Plan Locator - Map GPS positions onto calibrated floor plans

Usage:
  plan-locator <command> [options]

Commands:
  list                    List saved plans, most recently opened first
  calibrate               Save a plan calibrated from three reference points
  locate                  Plan pixel for a GPS position
  pixel                   GPS position for a plan pixel
  info                    Scale and north angle of a saved plan
  delete                  Remove a saved plan

Options:
  --store <path>          Saved plans file (default: $PLAN_STORE_PATH or plans.json)
  --id <id>               Saved plan id
  --name <name>           Plan name (calibrate)
  --file <path>           Plan image or PDF path (calibrate)
  --point <a,b,x,y>       Reference point: lat,lng (or easting,northing with
                          --epsg) and plan pixel x,y. Give exactly three.
  --lat <deg>             Latitude (locate)
  --lng <deg>             Longitude (locate)
  --epsg <code>           Read coordinates in this projected system
  --easting <m>           Easting (locate, with --epsg)
  --northing <m>          Northing (locate, with --epsg)
  --x <px>  --y <px>      Plan pixel (pixel)

Other:
  -v, --verbose           Enable verbose logging
  -h, --help              Show this help message

Examples:
  plan-locator calibrate --name "Level 2" --file ./level2.pdf \\
    --point 48.8584,2.2945,120,80 \\
    --point 48.8590,2.2950,640,90 \\
    --point 48.8580,2.2952,600,500

  plan-locator locate --id <id> --lat 48.8586 --lng 2.2948
  plan-locator locate --id <id> --epsg 32631 --easting 448252 --northing 5411935
`;

async function loadPlan(store: PlanStore, options: CLIOptions): Promise<SavedPlan> {
  const id = requireValue(options.id, '--id');
  const plan = await store.get(id);
  if (!plan) {
    throw new UsageError(`No saved plan with id "${id}"`);
  }
  return plan;
}

function printPlan(plan: SavedPlan): void {
  console.log(`${plan.id}  ${plan.name}`);
  console.log(`  File: ${plan.filePath}`);
  console.log(`  Last opened: ${plan.lastOpened.toISOString()}`);
}

async function run(options: CLIOptions): Promise<void> {
  const config = createDefaultConfig();
  const store = new PlanStore(options.store ?? config.storePath);
  const engine = new TransformEngine(config.engine);

  switch (requireValue(options.command, 'A command')) {
    case 'list': {
      const plans = await store.list();
      if (plans.length === 0) {
        console.log('No saved plans');
      }
      for (const plan of plans) {
        printPlan(plan);
      }
      break;
    }

    case 'calibrate': {
      if (options.points.length !== 3) {
        throw new UsageError(`Exactly three --point values are required, got ${options.points.length}`);
      }
      const collector = new CalibrationCollector({ ...config.collector, displayScale: 1 });
      for (const value of options.points) {
        const { world, pixel } = parsePoint(value, options.epsg);
        collector.add(world, pixel);
      }
      collector.commit(engine);

      const plan = planFromEngine(engine, {
        id: options.id ?? randomUUID(),
        name: requireValue(options.name, '--name'),
        filePath: requireValue(options.file, '--file'),
      });
      await store.save(plan);

      const solved = engine.solve();
      console.log(`Saved plan ${plan.id}`);
      if (solved.status === 'ok') {
        console.log(`Transform: ${solved.value.kind}`);
      } else if (solved.status === 'degenerate') {
        console.log(`Warning: ${solved.reason}`);
      }
      break;
    }

    case 'locate': {
      restorePlan(engine, await loadPlan(store, options));
      const world = options.epsg === undefined
        ? toGeoPoint(requireValue(options.lat, '--lat'), requireValue(options.lng, '--lng'), undefined)
        : toGeoPoint(requireValue(options.easting, '--easting'), requireValue(options.northing, '--northing'), options.epsg);

      const located = engine.locate(world.latitude, world.longitude);
      if (located.status !== 'ok') {
        throw new UsageError(located.status === 'degenerate' ? located.reason : 'Plan is not calibrated');
      }
      console.log(`${located.value.x.toFixed(2)} ${located.value.y.toFixed(2)}`);
      break;
    }

    case 'pixel': {
      restorePlan(engine, await loadPlan(store, options));
      const world = engine.unlocate(requireValue(options.x, '--x'), requireValue(options.y, '--y'));
      if (world.status !== 'ok') {
        throw new UsageError(world.status === 'degenerate' ? world.reason : 'Plan is not calibrated');
      }
      console.log(`${world.value.latitude.toFixed(7)} ${world.value.longitude.toFixed(7)}`);
      break;
    }

    case 'info': {
      const plan = await loadPlan(store, options);
      restorePlan(engine, plan);
      printPlan(plan);

      const solved = engine.solve();
      console.log(`  Transform: ${solved.status === 'ok' ? solved.value.kind : solved.status}`);

      const scale = engine.pixelsPerMeter();
      console.log(`  Scale: ${scale === null ? 'unavailable' : `${scale.toFixed(4)} px/m`}`);

      const north = engine.northAngle();
      console.log(`  North: ${((north * 180) / Math.PI).toFixed(2)}° from +x`);
      break;
    }

    case 'delete': {
      const id = requireValue(options.id, '--id');
      if (!(await store.delete(id))) {
        throw new UsageError(`No saved plan with id "${id}"`);
      }
      console.log(`Deleted plan ${id}`);
      break;
    }
  }
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  let options: CLIOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    console.error('Use --help for usage information');
    process.exit(1);
  }

  if (options.help || args.length === 0) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  // Keep stdout for command output unless logging was asked for
  if (options.verbose) {
    setLogLevel('debug');
  } else if (!process.env.LOG_LEVEL) {
    setLogLevel('warn');
  }

  try {
    await run(options);
    process.exit(0);
  } catch (error) {
    if (error instanceof UsageError || error instanceof PlanLocatorError) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error('Error:', error instanceof Error ? error.message : error);
    }
    logger.debug({ error }, 'Command failed');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

#!/usr/bin/env node
/**
 * Render a scene file to a BMP.
 *
 * Usage:
 *   calendar-render --scene scene.json --out calendar.bmp
 *   calendar-render --scene scene.json --out calendar.bmp --now 2026-10-19T07:30:00Z --log-level debug
 *
 * Options:
 *   --scene <file>       Scene JSON (config, events, weather, footerText, now)
 *   --out <file>         Where to write the BMP
 *   --now <iso>          Reference instant; overrides the scene's `now`
 *   --font-dir <dir>     Directory searched for the configured font families
 *   --log-level <level>  debug | info | warn | error (default: info)
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { encodeBMP } from './bmp.js';
import { ConfigError } from './errors.js';
import { renderFrame } from './frame.js';
import { createLogger, isLogLevel, type LogLevel } from './logger.js';
import { parseScene } from './scene.js';
import { FontCache } from './typography/font-cache.js';

export interface CliOptions {
  scene: string;
  out: string;
  now?: Date;
  fontDir?: string;
  logLevel: LogLevel;
}

const USAGE = 'Usage: calendar-render --scene <file> --out <file> [--now <iso>] [--font-dir <dir>] [--log-level <level>]';

export function parseArgs(args: string[]): CliOptions {
  let scene: string | undefined;
  let out: string | undefined;
  let now: Date | undefined;
  let fontDir: string | undefined;
  let logLevel: LogLevel = 'info';

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`Missing value for ${flag}. ${USAGE}`, 'INVALID_ARGUMENTS', flag);
    }
    switch (flag) {
      case '--scene':
        scene = value;
        break;
      case '--out':
        out = value;
        break;
      case '--now':
        now = new Date(value);
        if (Number.isNaN(now.getTime())) {
          throw new ConfigError(`--now is not a valid timestamp: ${value}`, 'INVALID_ARGUMENTS', flag);
        }
        break;
      case '--font-dir':
        fontDir = value;
        break;
      case '--log-level':
        if (!isLogLevel(value)) {
          throw new ConfigError(`Unknown log level "${value}"`, 'INVALID_ARGUMENTS', flag);
        }
        logLevel = value;
        break;
      default:
        throw new ConfigError(`Unknown option ${flag}. ${USAGE}`, 'INVALID_ARGUMENTS', flag);
    }
    i++;
  }

  if (!scene || !out) {
    throw new ConfigError(USAGE, 'INVALID_ARGUMENTS');
  }
  return { scene, out, now, fontDir, logLevel };
}

/** Render the scene named in `args` and write the BMP. Returns the bytes written. */
export function runCli(args: string[]): number {
  const options = parseArgs(args);
  const logger = createLogger('calendar-render', { level: options.logLevel });

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(options.scene, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read scene ${options.scene}: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_SCENE',
    );
  }

  const scene = parseScene(raw);
  const result = renderFrame({
    events: scene.events,
    weather: scene.weather,
    config: scene.config,
    now: options.now ?? scene.now,
    footerText: scene.footerText,
    fonts: new FontCache(options.fontDir),
    logger,
  });

  const bytes = encodeBMP(result.image);
  writeFileSync(options.out, bytes);
  logger.info('Wrote frame', {
    out: options.out,
    viewMode: scene.config.viewMode,
    bytes: bytes.length,
    diagnostics: result.diagnostics.length,
  });
  return bytes.length;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

if (isEntryPoint()) {
  try {
    runCli(process.argv.slice(2));
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error('Failed to render frame:', err instanceof Error ? err.message : err);
    }
    process.exitCode = 1;
  }
}

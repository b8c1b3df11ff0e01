import { isLayoutName, LayoutName } from '../game/layouts';
import type { RenderOptions } from './renderBoard';

export interface DemoConfig {
  layouts: LayoutName[];
  glyphs: RenderOptions;
  debug: boolean;
}

export class DemoConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DemoConfigError';
  }
}

const DEFAULT_LAYOUTS = 'standard,cross,diagonal';

type Env = Record<string, string | undefined>;

/**
 * Read demo settings from the environment (after dotenv has loaded .env)
 */
export function loadDemoConfig(env: Env = process.env): DemoConfig {
  const layouts: LayoutName[] = [];
  for (const raw of (env.BOARD_DEMO_LAYOUTS || DEFAULT_LAYOUTS).split(',')) {
    const name = raw.trim();
    if (name === '') continue;
    if (!isLayoutName(name)) {
      throw new DemoConfigError(`Unknown layout "${name}" in BOARD_DEMO_LAYOUTS`);
    }
    layouts.push(name);
  }

  if (layouts.length === 0) {
    throw new DemoConfigError('BOARD_DEMO_LAYOUTS names no layouts');
  }

  const glyphs: RenderOptions = {};
  const holeGlyph = readGlyph(env, 'BOARD_HOLE_GLYPH');
  const lightGlyph = readGlyph(env, 'BOARD_LIGHT_GLYPH');
  const darkGlyph = readGlyph(env, 'BOARD_DARK_GLYPH');
  if (holeGlyph) glyphs.holeGlyph = holeGlyph;
  if (lightGlyph) glyphs.lightGlyph = lightGlyph;
  if (darkGlyph) glyphs.darkGlyph = darkGlyph;

  return {
    layouts,
    glyphs,
    debug: env.BOARD_DEBUG === 'true',
  };
}

function readGlyph(env: Env, variable: string): string | undefined {
  const value = env[variable];
  if (value === undefined || value === '') return undefined;

  // Count code points, not UTF-16 units
  if ([...value].length !== 1) {
    throw new DemoConfigError(`${variable} must be a single character, got "${value}"`);
  }
  return value;
}

import { describe, it, expect } from 'vitest';
import { DemoConfigError, loadDemoConfig } from './config';

describe('loadDemoConfig', () => {
  it('defaults to every layout without overrides', () => {
    expect(loadDemoConfig({})).toEqual({
      layouts: ['standard', 'cross', 'diagonal'],
      glyphs: {},
      debug: false,
    });
  });

  it('reads the layout list, ignoring blanks and spaces', () => {
    const config = loadDemoConfig({ BOARD_DEMO_LAYOUTS: ' cross , ,standard' });
    expect(config.layouts).toEqual(['cross', 'standard']);
  });

  it('rejects unknown layouts', () => {
    expect(() => loadDemoConfig({ BOARD_DEMO_LAYOUTS: 'standard,hexagon' })).toThrow(DemoConfigError);
    expect(() => loadDemoConfig({ BOARD_DEMO_LAYOUTS: 'standard,hexagon' })).toThrow(
      'Unknown layout "hexagon" in BOARD_DEMO_LAYOUTS',
    );
  });

  it('rejects a list with no names', () => {
    expect(() => loadDemoConfig({ BOARD_DEMO_LAYOUTS: ' , ' })).toThrow('BOARD_DEMO_LAYOUTS names no layouts');
  });

  it('reads glyph overrides', () => {
    const config = loadDemoConfig({
      BOARD_HOLE_GLYPH: 'x',
      BOARD_LIGHT_GLYPH: '',
      BOARD_DARK_GLYPH: '█',
    });
    expect(config.glyphs).toEqual({ holeGlyph: 'x', darkGlyph: '█' });
  });

  it('rejects glyphs longer than one character', () => {
    expect(() => loadDemoConfig({ BOARD_HOLE_GLYPH: '..' })).toThrow(
      'BOARD_HOLE_GLYPH must be a single character, got ".."',
    );
  });

  it('enables debug only for "true"', () => {
    expect(loadDemoConfig({ BOARD_DEBUG: 'true' }).debug).toBe(true);
    expect(loadDemoConfig({ BOARD_DEBUG: '1' }).debug).toBe(false);
  });
});

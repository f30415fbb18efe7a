import { describe, expect, it } from 'vitest';
import { ConfigError } from '../src/errors.js';
import { parseScene } from '../src/scene.js';
import { INVALID_WEATHER } from '../src/types.js';

const FALLBACK = new Date('2026-10-19T12:00:00Z');

function errorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseScene', () => {
  it('should default everything for an empty scene', () => {
    const scene = parseScene({}, FALLBACK);
    expect(scene.config.viewMode).toBe('two_week');
    expect(scene.now).toEqual(FALLBACK);
    expect(scene.weather).toEqual(INVALID_WEATHER);
    expect(scene.events).toEqual([]);
    expect(scene.footerText).toBeUndefined();
  });

  it('should prefer the scene clock', () => {
    const scene = parseScene({ now: '2026-10-19T07:30:00-04:00' }, FALLBACK);
    expect(scene.now.toISOString()).toBe('2026-10-19T11:30:00.000Z');
  });

  it('should default weather to valid when given', () => {
    const scene = parseScene({ weather: { condition: 'sunny', temperature: 70 } }, FALLBACK);
    expect(scene.weather).toEqual({ condition: 'sunny', temperature: 70, isValid: true });
  });

  it('should color events by calendar, coloring unlisted calendars after listed ones', () => {
    const scene = parseScene(
      {
        config: { calendars: [{ id: 'work', color: 'blue' }, { id: 'family' }] },
        events: [
          { calendar: 'school', title: 'Play', start: '2026-10-19T09:00:00Z', end: '2026-10-19T10:00:00Z' },
          { calendar: 'work', title: 'Standup', start: '2026-10-19T09:00:00Z', end: '2026-10-19T09:15:00Z' },
          { calendar: 'family', title: 'Dinner', start: '2026-10-19T18:00:00Z', end: '2026-10-19T19:00:00Z' },
          { calendar: 'family', title: 'Party', start: '2026-10-20T18:00:00Z', end: '2026-10-20T19:00:00Z', color: ' Red ' },
        ],
      },
      FALLBACK,
    );
    expect(scene.events.map((event) => [event.title, event.colorKey])).toEqual([
      ['Play', 'green'],
      ['Standup', 'blue'],
      ['Dinner', 'yellow'],
      ['Party', 'red'],
    ]);
  });

  it('should keep configured calendar colors when sorting by id', () => {
    const scene = parseScene(
      {
        config: { colorCycle: 'calendar_id', calendars: [{ id: 'bravo' }, { id: 'charlie' }] },
        events: [
          { calendar: 'alpha', title: 'A', start: '2026-10-19T09:00:00Z', end: '2026-10-19T10:00:00Z' },
          { calendar: 'charlie', title: 'C', start: '2026-10-19T09:00:00Z', end: '2026-10-19T10:00:00Z' },
          { calendar: 'bravo', title: 'B', start: '2026-10-19T09:00:00Z', end: '2026-10-19T10:00:00Z' },
        ],
      },
      FALLBACK,
    );
    expect(scene.events.map((event) => [event.sourceCalendarId, event.colorKey])).toEqual([
      ['alpha', 'green'],
      ['charlie', 'yellow'],
      ['bravo', 'red'],
    ]);
  });

  it('should place date-only all-day events at midnight in the configured zone', () => {
    const scene = parseScene(
      {
        config: { timeZone: 'America/New_York' },
        events: [{ id: 'fair', calendar: 'family', title: 'Fair', start: '2026-10-19', end: '2026-10-20', allDay: true }],
      },
      FALLBACK,
    );
    expect(scene.events[0]).toMatchObject({ id: 'fair', sourceCalendarId: 'family', isAllDay: true });
    expect(scene.events[0].start.toISOString()).toBe('2026-10-19T04:00:00.000Z');
    expect(scene.events[0].end.toISOString()).toBe('2026-10-20T04:00:00.000Z');
  });

  it('should reject an event color outside the palette with its path', () => {
    const error = errorOf(() =>
      parseScene({
        events: [
          { calendar: 'family', title: 'Ok', start: '2026-10-19T09:00:00Z', end: '2026-10-19T10:00:00Z' },
          { calendar: 'family', title: 'Bad', start: '2026-10-19T09:00:00Z', end: '2026-10-19T10:00:00Z', color: 'purple' },
        ],
      }),
    );
    expect(error.code).toBe('INVALID_CALENDAR_COLOR');
    expect(error.path).toBe('events.1.color');
  });

  it('should reject unknown scene properties', () => {
    const error = errorOf(() => parseScene({ theme: 'dark' }));
    expect(error.code).toBe('INVALID_SCENE');
  });

  it('should reject a timestamp without an offset', () => {
    const error = errorOf(() =>
      parseScene({ events: [{ calendar: 'family', title: 'Vague', start: '2026-10-19T09:00:00', end: '2026-10-19T10:00:00Z' }] }),
    );
    expect(error.code).toBe('INVALID_SCENE');
    expect(error.path).toBe('events.0.start');
  });

  it('should carry invalid view configuration as a scene error', () => {
    const error = errorOf(() => parseScene({ config: { viewMode: 'year' } }));
    expect(error.code).toBe('INVALID_SCENE');
    expect(error.path).toBe('config.viewMode');
  });
});

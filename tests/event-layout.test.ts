import { describe, expect, it } from 'vitest';
import { compareEvents, createCalendarDirectory, daysTouched, groupEventsByDay, normalizeEvents } from '../src/layout/days.js';
import { layoutEvents, overflowText, resolveCapacity, type LayoutOptions } from '../src/layout/event-layout.js';
import type { CalendarEvent } from '../src/types.js';
import { allDay, timed } from './helpers.js';

function options(overrides: Partial<LayoutOptions> = {}): LayoutOptions {
  return {
    capacity: 3,
    showTime: false,
    maxWidth: 1000,
    measure: (text) => text.length * 8,
    formatTime: (date) => date.toISOString().slice(11, 16),
    ...overrides,
  };
}

function hourly(count: number): CalendarEvent[] {
  return Array.from({ length: count }, (_, i) =>
    timed(`Event ${i + 1}`, `2026-10-19T${String(8 + i).padStart(2, '0')}:00:00Z`, `2026-10-19T${String(9 + i).padStart(2, '0')}:00:00Z`),
  );
}

describe('layoutEvents', () => {
  it('should show every event when they fit', () => {
    for (let n = 0; n <= 4; n++) {
      const result = layoutEvents(hourly(n), options({ capacity: 4 }));
      expect(result.shown).toHaveLength(n);
      expect(result.overflowCount).toBe(0);
      expect(result.shown.every((line) => line.kind === 'event')).toBe(true);
    }
  });

  it('should reserve the last slot for the overflow line', () => {
    for (let capacity = 1; capacity <= 4; capacity++) {
      for (let n = capacity + 1; n <= 8; n++) {
        const result = layoutEvents(hourly(n), options({ capacity }));
        expect(result.shown).toHaveLength(capacity);
        expect(result.shown.filter((line) => line.kind === 'event')).toHaveLength(capacity - 1);
        expect(result.overflowCount).toBe(n - (capacity - 1));
        expect(result.shown[capacity - 1]).toEqual({ kind: 'overflow', count: n - (capacity - 1), text: `+${n - (capacity - 1)} more` });
      }
    }
  });

  it('should show two events and +3 more for five events in three slots', () => {
    const result = layoutEvents(hourly(5), options({ capacity: 3 }));
    expect(result.shown.map((line) => line.text)).toEqual(['Event 1', 'Event 2', '+3 more']);
    expect(result.overflowCount).toBe(3);
  });

  it('should show nothing when the capacity is zero', () => {
    const result = layoutEvents(hourly(2), options({ capacity: 0 }));
    expect(result).toEqual({ shown: [], overflowCount: 2 });
  });

  it('should put all-day events first and keep start order', () => {
    const events = [
      timed('Lunch', '2026-10-19T12:00:00Z', '2026-10-19T13:00:00Z'),
      allDay('Holiday', '2026-10-19', '2026-10-20'),
      timed('Breakfast', '2026-10-19T07:00:00Z', '2026-10-19T08:00:00Z'),
    ];
    const result = layoutEvents(events, options());
    expect(result.shown.map((line) => line.text)).toEqual(['Holiday', 'Breakfast', 'Lunch']);
  });

  it('should break start-time ties by calendar priority', () => {
    const calendars = createCalendarDirectory([{ id: 'work' }, { id: 'family' }]);
    const events = [
      timed('A from family', '2026-10-19T09:00:00Z', '2026-10-19T10:00:00Z', { sourceCalendarId: 'family' }),
      timed('B from work', '2026-10-19T09:00:00Z', '2026-10-19T10:00:00Z', { sourceCalendarId: 'work' }),
    ];
    const result = layoutEvents(events, options({ priority: calendars.priority }));
    expect(result.shown.map((line) => line.text)).toEqual(['B from work', 'A from family']);
  });

  it('should prefix timed events only', () => {
    const events = [allDay('Holiday', '2026-10-19', '2026-10-20'), timed('Dentist', '2026-10-19T09:30:00Z', '2026-10-19T10:00:00Z')];
    const result = layoutEvents(events, options({ showTime: true }));
    expect(result.shown.map((line) => line.text)).toEqual(['Holiday', '09:30 Dentist']);
  });

  it('should use a start-end range when asked, except for instants', () => {
    const events = [
      timed('Dentist', '2026-10-19T09:30:00Z', '2026-10-19T10:00:00Z'),
      timed('Pickup', '2026-10-19T15:00:00Z', '2026-10-19T15:00:00Z'),
    ];
    const result = layoutEvents(events, options({ showTime: true, timeStyle: 'range' }));
    expect(result.shown.map((line) => line.text)).toEqual(['09:30-10:00 Dentist', '15:00 Pickup']);
  });

  it('should truncate long titles to the line width', () => {
    const events = [timed('Parent conference night', '2026-10-19T09:00:00Z', '2026-10-19T10:00:00Z')];
    const result = layoutEvents(events, options({ maxWidth: 80 }));
    expect(result.shown[0].text).toBe('Parent...');
  });

  it('should pass titles through describe', () => {
    const events = [timed('Dentist', '2026-10-19T09:30:00Z', '2026-10-19T10:00:00Z')];
    const result = layoutEvents(events, options({ describe: (event) => `${event.title} (Family)` }));
    expect(result.shown[0].text).toBe('Dentist (Family)');
  });
});

describe('resolveCapacity', () => {
  it('should prefer an explicit maximum', () => {
    expect(resolveCapacity(3, 10, 10)).toBe(3);
  });

  it('should derive from the cell height otherwise', () => {
    expect(resolveCapacity(0, 95, 10)).toBe(9);
    expect(resolveCapacity(0, 9, 10)).toBe(0);
  });

  it('should format the overflow text', () => {
    expect(overflowText(12)).toBe('+12 more');
  });
});

describe('day bucketing', () => {
  it('should place a multi-day all-day event on every day it covers', () => {
    const event = allDay('Trip', '2026-10-19', '2026-10-22');
    expect(daysTouched(event, 'UTC')).toEqual(['2026-10-19', '2026-10-20', '2026-10-21']);
  });

  it('should not spill a timed event ending at midnight into the next day', () => {
    const event = timed('Party', '2026-10-19T20:00:00Z', '2026-10-20T00:00:00Z');
    expect(daysTouched(event, 'UTC')).toEqual(['2026-10-19']);
  });

  it('should split a timed event that crosses midnight', () => {
    const event = timed('Flight', '2026-10-19T22:00:00Z', '2026-10-20T03:00:00Z');
    expect(daysTouched(event, 'UTC')).toEqual(['2026-10-19', '2026-10-20']);
  });

  it('should keep zero-length events on their start day', () => {
    const event = timed('Pickup', '2026-10-19T15:00:00Z', '2026-10-19T15:00:00Z');
    expect(daysTouched(event, 'UTC')).toEqual(['2026-10-19']);
  });

  it('should give every requested day a bucket', () => {
    const buckets = groupEventsByDay([allDay('Trip', '2026-10-20', '2026-10-22')], ['2026-10-19', '2026-10-20', '2026-10-21'], 'UTC');
    expect([...buckets.keys()]).toEqual(['2026-10-19', '2026-10-20', '2026-10-21']);
    expect(buckets.get('2026-10-19')).toEqual([]);
    expect(buckets.get('2026-10-20')?.map((e) => e.title)).toEqual(['Trip']);
    expect(buckets.get('2026-10-21')?.map((e) => e.title)).toEqual(['Trip']);
  });

  it('should clamp events that end before they start and report them', () => {
    const bad = timed('Backwards', '2026-10-19T10:00:00Z', '2026-10-19T09:00:00Z', { sourceCalendarId: 'work' });
    const good = timed('Fine', '2026-10-19T10:00:00Z', '2026-10-19T11:00:00Z');
    const { events, issues } = normalizeEvents([bad, good]);
    expect(events[0].end.getTime()).toBe(events[0].start.getTime());
    expect(events[1]).toBe(good);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ name: 'DataShapeError', eventTitle: 'Backwards', sourceCalendarId: 'work' });
  });

  it('should order all-day before timed regardless of start', () => {
    const early = timed('Early', '2026-10-18T23:00:00Z', '2026-10-19T01:00:00Z');
    const holiday = allDay('Holiday', '2026-10-19', '2026-10-20');
    expect(compareEvents(holiday, early)).toBeLessThan(0);
  });
});

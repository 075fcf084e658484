// src/commands/syncCommand.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';
import pino from 'pino';
import { runSync } from './syncCommand.js';
import type { SyncDeps, SyncOptions } from './syncCommand.js';
import { createCanonicalEvent } from '../lib/canonicalEvent.js';
import type { CalendarService } from '../types/calendar.js';

const LA = 'America/Los_Angeles';

const recital = createCanonicalEvent({
  title: 'Recital',
  purchased: true,
  start_date: '2024-06-02',
  end_date: '2024-06-02',
  start_time: '18:00:00',
  end_time: '19:30:00',
});

const picnic = createCanonicalEvent({ title: 'Picnic', start_date: '2024-06-01', end_date: '2024-06-01' });

const baseOptions: SyncOptions = {
  calendarId: 'family',
  dryRun: false,
  stats: false,
  deleteMatches: false,
};

describe('runSync', () => {
  let service: CalendarService;
  let written: string[];
  let deps: SyncDeps;

  beforeEach(() => {
    let nextId = 0;
    service = {
      listCalendars: vi.fn<CalendarService['listCalendars']>().mockResolvedValue([]),
      createEvent: vi.fn<CalendarService['createEvent']>(async () => {
        nextId += 1;
        return `id-${nextId}`;
      }),
      fetchEventPage: vi.fn<CalendarService['fetchEventPage']>().mockResolvedValue({
        items: [
          { id: 'evt-1', title: 'recital', date: '2024-06-02' },
          { id: 'evt-2', title: 'Bake Sale', date: '2024-06-01' },
        ],
      }),
      deleteEvent: vi.fn<CalendarService['deleteEvent']>().mockResolvedValue(undefined),
    };
    written = [];
    deps = {
      calendar: vi.fn(async () => service),
      timeZone: LA,
      log: pino({ level: 'silent' }),
      write: (text) => {
        written.push(text);
      },
    };
  });

  describe('create', () => {
    it('should preview sorted events without touching the calendar', async () => {
      const outcome = await runSync([recital, picnic], { ...baseOptions, dryRun: true }, deps);

      expect(outcome).toEqual({ action: 'create-preview', events: [picnic, recital] });
      expect(deps.calendar).not.toHaveBeenCalled();
      expect(written).toHaveLength(1);
      expect(written[0]?.split('\n')[3]).toBe('Picnic' + ' '.repeat(35) + '2024-06-01   all-day  2024-06-01   all-day');
    });

    it('should add statistics to a preview when asked', async () => {
      await runSync([recital, picnic], { ...baseOptions, dryRun: true, stats: true }, deps);

      expect(written).toHaveLength(2);
      expect(written[1]?.split('\n')[5]).toBe('Total Events: 2 (1 purchased)');
    });

    it('should create events in date order', async () => {
      const outcome = await runSync([recital, picnic], baseOptions, deps);

      expect(outcome).toEqual({ action: 'created', eventIds: ['id-1', 'id-2'] });
      expect(service.createEvent).toHaveBeenNthCalledWith(1, 'family', {
        summary: 'Picnic',
        start: { date: '2024-06-01' },
        end: { date: '2024-06-02' },
      });
      expect(service.createEvent).toHaveBeenNthCalledWith(2, 'family', {
        summary: 'Recital',
        start: { dateTime: '2024-06-03T01:00:00.000Z', timeZone: LA },
        end: { dateTime: '2024-06-03T02:30:00.000Z', timeZone: LA },
      });
      expect(written).toEqual([]);
    });

    it('should only create events that pass the filter', async () => {
      const outcome = await runSync([recital, picnic], { ...baseOptions, purchasedOnly: true }, deps);

      expect(outcome).toEqual({ action: 'created', eventIds: ['id-1'] });
      expect(service.createEvent).toHaveBeenCalledTimes(1);
    });
  });

  describe('delete', () => {
    it('should preview matching calendar events', async () => {
      const outcome = await runSync([recital, picnic], { ...baseOptions, deleteMatches: true, dryRun: true }, deps);

      expect(outcome).toEqual({
        action: 'delete-preview',
        matches: [{ local: recital, remote: { id: 'evt-1', title: 'recital', date: '2024-06-02' } }],
      });
      expect(service.fetchEventPage).toHaveBeenCalledWith(
        'family',
        { start: '2024-06-01', endExclusive: '2024-06-03' },
        undefined
      );
      expect(service.deleteEvent).not.toHaveBeenCalled();
      expect(written[0]?.split('\n')[1]).toBe('1 events would be DELETED:');
    });

    it('should delete each matched calendar event once', async () => {
      const duplicate = createCanonicalEvent({ title: 'RECITAL', start_date: '2024-06-02', end_date: '2024-06-02' });

      const outcome = await runSync([recital, duplicate], { ...baseOptions, deleteMatches: true }, deps);

      expect(outcome).toEqual({ action: 'deleted', deleted: 1 });
      expect(service.deleteEvent).toHaveBeenCalledTimes(1);
      expect(service.deleteEvent).toHaveBeenCalledWith('family', 'evt-1');
    });
  });
});

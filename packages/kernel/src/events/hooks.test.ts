import { describe, it, expect, vi } from 'vitest';
import { createLogger, type LogLevel } from '@fieldwise/shared';
import { CompositeEventHooks, LoggingEventHooks, type ParseStartEvent } from './hooks.js';

const startEvent: ParseStartEvent = { parseId: 'parse_1', timestamp: '2024-01-01T00:00:00.000Z', lineCount: 3 };

describe('CompositeEventHooks', () => {
  it('should dispatch to every listener', async () => {
    const first = vi.fn();
    const second = vi.fn();
    const hooks = new CompositeEventHooks([{ onParseStart: first }, { onParseStart: second }, {}]);

    await hooks.onParseStart(startEvent);

    expect(first).toHaveBeenCalledWith(startEvent);
    expect(second).toHaveBeenCalledWith(startEvent);
  });

  it('should wait for async listeners', async () => {
    const seen: string[] = [];
    const hooks = new CompositeEventHooks([
      {
        onParseComplete: async (event) => {
          await Promise.resolve();
          seen.push(event.parseId);
        },
      },
    ]);

    await hooks.onParseComplete({
      parseId: 'parse_2',
      timestamp: '2024-01-01T00:00:00.000Z',
      durationMs: 4,
      source: 'unresolved',
      confidence: 0,
      needsReview: true,
    });

    expect(seen).toEqual(['parse_2']);
  });
});

describe('LoggingEventHooks', () => {
  it('should log events at debug level', () => {
    const lines: Array<[LogLevel, string]> = [];
    const logger = createLogger({ level: 'debug', sink: (level, line) => lines.push([level, line]) });

    new LoggingEventHooks(logger).onParseStart(startEvent);

    expect(lines).toHaveLength(1);
    expect(lines[0]?.[0]).toBe('debug');
    expect(lines[0]?.[1]).toMatch(/\[DEBUG\] \[fieldwise\] Parse started \{"parseId":"parse_1","lineCount":3\}$/);
  });
});

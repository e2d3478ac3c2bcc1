import {
  JOB_STATES,
  isActiveState,
  isJobState,
  isSuccessState,
  isTerminalState,
} from '../src/core/entities/JobState.js';
import { classifyStatusResponse, decodeStatus } from '../src/core/decoding/StatusDecoder.js';
import { decodeMessages, safeBool, safeFraction, safeInt } from '../src/core/decoding/coerce.js';
import { MalformedStatusError } from '../src/core/errors.js';

describe('JobState', () => {
  test('should split states into active, terminal and paused', () => {
    expect(JOB_STATES.filter(isActiveState)).toEqual(['QUEUED', 'PARSING', 'RUNNING', 'FINALIZING']);
    expect(JOB_STATES.filter(isTerminalState)).toEqual(['DONE', 'FAILED']);
    expect(isActiveState('PAUSED')).toBe(false);
    expect(isTerminalState('PAUSED')).toBe(false);
  });

  test('should only count DONE as success', () => {
    expect(JOB_STATES.filter(isSuccessState)).toEqual(['DONE']);
  });

  test('should recognise wire spellings only', () => {
    expect(isJobState('FINALIZING')).toBe(true);
    expect(isJobState('finalizing')).toBe(false);
    expect(isJobState(3)).toBe(false);
  });
});

describe('Field coercion', () => {
  test('should parse numeric strings and truncate fractions', () => {
    expect(safeInt('100')).toBe(100);
    expect(safeInt(10.5)).toBe(10);
    expect(safeInt(' 7 ')).toBe(7);
  });

  test('should fall back on garbage, negatives and absent values', () => {
    expect(safeInt('lots')).toBe(0);
    expect(safeInt(-5)).toBe(0);
    expect(safeInt(Number.NaN)).toBe(0);
    expect(safeInt(undefined)).toBe(0);
    expect(safeInt(null, 3)).toBe(3);
  });

  test('should clamp progress into [0, 1]', () => {
    expect(safeFraction(1.7)).toBe(1);
    expect(safeFraction(-0.2)).toBe(0);
    expect(safeFraction('0.25')).toBe(0.25);
  });

  test('should read boolean-ish values', () => {
    expect(safeBool(true)).toBe(true);
    expect(safeBool(1)).toBe(true);
    expect(safeBool('1')).toBe(true);
    expect(safeBool('True')).toBe(true);
    expect(safeBool('0')).toBe(false);
    expect(safeBool('maybe')).toBe(false);
    expect(safeBool(undefined)).toBe(false);
  });

  test('should normalise messages and drop the ones without text', () => {
    expect(
      decodeMessages([{ type: 'warn', text: 'slow' }, { type: 'info' }, 'loose', { text: 'no type' }])
    ).toEqual([
      { severity: 'WARN', text: 'slow' },
      { severity: 'INFO', text: 'no type' },
    ]);
    expect(decodeMessages('not a list')).toEqual([]);
  });
});

describe('decodeStatus', () => {
  test('should decode the entry envelope', () => {
    const snapshot = decodeStatus({
      entry: [
        {
          name: '1700000000.42',
          content: {
            sid: '1700000000.42',
            dispatchState: 'RUNNING',
            doneProgress: '0.5',
            eventCount: '100',
            resultCount: 10.5,
            scanCount: 2000,
            runDuration: '5.25',
            isDone: '0',
            isFailed: false,
            isPaused: 0,
            ttl: 600,
            messages: [{ type: 'warn', text: 'slow' }, { type: 'info' }],
          },
        },
      ],
    });

    expect(snapshot.toJSON()).toEqual({
      identifier: '1700000000.42',
      state: 'RUNNING',
      progressPercent: 50,
      eventCount: 100,
      resultCount: 10,
      scanCount: 2000,
      runDurationSeconds: 5.25,
      ttlSeconds: 600,
      isDone: false,
      isFailed: false,
      isPaused: false,
      messages: [{ severity: 'WARN', text: 'slow' }],
      errorMessage: undefined,
    });
    expect(snapshot.isActive).toBe(true);
    expect(snapshot.toString()).toBe('StatusSnapshot(1700000000.42, RUNNING, 50.0%, results=10)');
  });

  test('should take the identifier from the entry name when content has no sid', () => {
    const snapshot = decodeStatus({ entry: [{ name: 'named-job', content: { dispatchState: 'QUEUED' } }] }, 'fallback');

    expect(snapshot.identifier).toBe('named-job');
  });

  test('should decode a wrapped response and use the fallback identifier', () => {
    const snapshot = decodeStatus({ content: { dispatchState: 'DONE', isDone: true, doneProgress: 1 } }, 'abc');

    expect(classifyStatusResponse({ content: {} }).kind).toBe('wrapped');
    expect(snapshot.identifier).toBe('abc');
    expect(snapshot.isDone).toBe(true);
    expect(snapshot.isTerminal).toBe(true);
    expect(snapshot.isSuccess).toBe(true);
  });

  test('should default every counter of a bare flat response', () => {
    const snapshot = decodeStatus({ dispatchState: 'QUEUED' }, 'job-9');

    expect(snapshot).toMatchObject({
      identifier: 'job-9',
      state: 'QUEUED',
      progressFraction: 0,
      eventCount: 0,
      resultCount: 0,
      scanCount: 0,
      runDurationSeconds: 0,
      ttlSeconds: 0,
      isDone: false,
      isFailed: false,
      isPaused: false,
    });
    expect(snapshot.messages).toEqual([]);
  });

  test('should decode every known state', () => {
    for (const state of JOB_STATES) {
      expect(decodeStatus({ dispatchState: state }).state).toBe(state);
    }
  });

  test('should keep flags that disagree with the state', () => {
    const snapshot = decodeStatus({ dispatchState: 'RUNNING', isFailed: '1', messages: [{ type: 'ERROR', text: 'boom' }] });

    expect(snapshot.state).toBe('RUNNING');
    expect(snapshot.isFailed).toBe(true);
    expect(snapshot.errorMessage).toBe('boom');
  });

  test('should only report an error message for failed jobs', () => {
    const snapshot = decodeStatus({ dispatchState: 'DONE', messages: [{ type: 'INFO', text: 'all good' }] });

    expect(snapshot.errorMessage).toBeUndefined();
  });

  test('should freeze the snapshot', () => {
    const snapshot = decodeStatus({ dispatchState: 'DONE', messages: [{ type: 'INFO', text: 'x' }] });

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.messages)).toBe(true);
  });

  describe('Malformed responses', () => {
    test('should reject a missing dispatch state', () => {
      expect(() => decodeStatus({ entry: [{ content: {} }] })).toThrow(
        new MalformedStatusError('Missing dispatchState in job status response', undefined)
      );
      expect(() => decodeStatus({ dispatchState: '' })).toThrow(MalformedStatusError);
    });

    test('should reject an unknown dispatch state and keep the raw value', () => {
      let caught: unknown;
      try {
        decodeStatus({ dispatchState: 'running' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MalformedStatusError);
      expect(caught).toMatchObject({ message: 'Invalid dispatchState: "running"', rawState: 'running' });
    });

    test('should reject an empty entry list', () => {
      expect(() => decodeStatus({ entry: [] })).toThrow('Invalid job status response: no entry returned');
    });

    test('should reject non-object responses', () => {
      expect(() => decodeStatus(null)).toThrow('Invalid job status response: got null, expected object');
      expect(() => decodeStatus('DONE')).toThrow('Invalid job status response: got string, expected object');
      expect(() => decodeStatus({ entry: ['DONE'] })).toThrow(
        'Invalid job status response: entry is string, expected object'
      );
    });
  });
});

import { RecordingTransport, failure } from '../../../test/testHelpers';
import { logger } from '../../application-logger';

import { parsePayloads, sendEvents } from './send-events';

describe('send-events', () => {
  const url = 'https://collector.example.com/v1/events';

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('parsePayloads', () => {
    it('returns one payload per non-blank line', () => {
      expect(parsePayloads('{"a":1}\n\n  {"b":2}  \r\n{"c":3}\n')).toEqual([
        '{"a":1}',
        '{"b":2}',
        '{"c":3}',
      ]);
    });

    it('returns nothing for empty input', () => {
      expect(parsePayloads('')).toEqual([]);
    });
  });

  describe('sendEvents', () => {
    it('delivers every payload in order and counts dropped ones', async () => {
      const transport = new RecordingTransport().willReturn(failure());
      jest.spyOn(logger, 'warn').mockImplementation();

      const summary = await sendEvents(url, ['event1', 'event2', 'event3'], transport, {
        maxBatchSize: 2,
        maxWaitMs: 1_000,
      });

      expect(summary).toEqual({ scheduled: 3, dropped: 1 });
      expect(transport.sent).toEqual([
        { destination: url, payload: 'event1' },
        { destination: url, payload: 'event2' },
        { destination: url, payload: 'event3' },
      ]);
    });

    it('flushes a partial batch without waiting for the timer', async () => {
      const transport = new RecordingTransport();

      const summary = await sendEvents(url, ['event1'], transport, {
        maxBatchSize: 10,
        maxWaitMs: 60_000,
      });

      expect(summary).toEqual({ scheduled: 1, dropped: 0 });
      expect(transport.payloads).toEqual(['event1']);
    });
  });
});

import * as fs from 'fs';

import type { CommandModule } from 'yargs';

import {
  COLLECTOR_URL_ENV_VAR,
  DEFAULT_MAX_BATCH_SIZE,
  DEFAULT_MAX_WAIT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from '../../constants';
import BufferedDispatcher from '../../events/buffered-dispatcher';
import {
  DeliveryFailureStrategy,
  FailureAction,
  dropOnFailure,
} from '../../events/delivery-failure-strategy';
import FetchTransport from '../../events/fetch-transport';
import QueueItem from '../../events/queue-item';
import Transport from '../../events/transport';

export type SendEventsSummary = {
  scheduled: number;
  dropped: number;
};

/** Splits newline-delimited input into payloads, skipping blank lines. */
export function parsePayloads(input: string): string[] {
  return input
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Schedules every payload for delivery to `url` and waits until the queue is drained. Failed
 * deliveries are dropped and counted.
 */
export async function sendEvents(
  url: string,
  payloads: string[],
  transport: Transport,
  config: { maxBatchSize: number; maxWaitMs: number },
): Promise<SendEventsSummary> {
  let dropped = 0;
  const countingStrategy: DeliveryFailureStrategy = {
    onDeliveryFailure(item: QueueItem, error: Error, attempts: number): FailureAction {
      dropped++;
      return dropOnFailure.onDeliveryFailure(item, error, attempts);
    },
  };
  const dispatcher = new BufferedDispatcher(transport, config, {
    failureStrategy: countingStrategy,
  });
  for (const payload of payloads) {
    dispatcher.schedule(url, payload);
  }
  await dispatcher.flush();
  return { scheduled: payloads.length, dropped };
}

export const sendEventsCommand: CommandModule = {
  command: 'send-events',
  describe: 'Deliver newline-delimited payloads from a file to a collector',
  builder: (yargs) => {
    return yargs.options({
      url: {
        type: 'string',
        description: 'Collector URL',
        alias: 'u',
        default: process.env[COLLECTOR_URL_ENV_VAR],
      },
      input: {
        type: 'string',
        description: 'File with one payload per line',
        alias: 'i',
      },
      'batch-size': {
        type: 'number',
        description: 'Number of queued items that triggers a flush',
        default: DEFAULT_MAX_BATCH_SIZE,
      },
      'wait-ms': {
        type: 'number',
        description: 'Milliseconds to wait before flushing a partial batch',
        default: DEFAULT_MAX_WAIT_MS,
      },
      'timeout-ms': {
        type: 'number',
        description: 'Per-request timeout in milliseconds',
        default: DEFAULT_REQUEST_TIMEOUT_MS,
      },
    });
  },
  handler: async (argv) => {
    const { url, input } = argv;
    if (typeof url !== 'string' || url.length === 0) {
      console.error('Error: collector URL is required');
      console.error('Provide it either as:');
      console.error('- Command line argument: --url <url> or -u <url>');
      console.error(`- Environment variable: ${COLLECTOR_URL_ENV_VAR}`);
      process.exit(1);
    }
    if (typeof input !== 'string') {
      console.error('Error: --input <file> is required');
      process.exit(1);
    }

    const maxBatchSize = Number(argv['batch-size']);
    const maxWaitMs = Number(argv['wait-ms']);
    const timeoutMs = Number(argv['timeout-ms']);
    try {
      const payloads = parsePayloads(fs.readFileSync(input, 'utf8'));
      const summary = await sendEvents(url, payloads, new FetchTransport({ timeoutMs }), {
        maxBatchSize,
        maxWaitMs,
      });
      console.log(
        `Delivered ${summary.scheduled - summary.dropped}/${summary.scheduled} payloads to ${url}`,
      );
      if (summary.dropped > 0) {
        process.exit(1);
      }
    } catch (error) {
      console.error('Error sending events:', error);
      process.exit(1);
    }
  },
};

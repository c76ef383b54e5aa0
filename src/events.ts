import type { Logger } from './logger.js';
import type { EventSink, PipelineEvent } from './types.js';

/**
 * Route pipeline events to the logger
 */
export function createLoggerSink(log: Logger): EventSink {
  return {
    emit(event: PipelineEvent): void {
      switch (event.type) {
        case 'page_fetched':
          log.debug('Fetcher', `Fetched ${event.url}`, { bytes: event.bytes });
          break;
        case 'page_parsed':
          log.info('Parser', `${event.count} course blocks on ${event.url}`);
          break;
        case 'record_skipped':
          log.warn('Normalizer', `Skipped record: ${event.reason}`, { url: event.url });
          break;
        case 'record_warning':
          log.warn('Normalizer', `${event.course}: ${event.warning}`);
          break;
        case 'page_committed':
          log.info('Loader', `Committed ${event.url}: +${event.inserted} new, ~${event.updated} updated`);
          break;
        case 'page_rolled_back':
          log.error('Loader', `Rolled back ${event.url}: ${event.reason}`);
          break;
        case 'page_failed':
          log.error('Pipeline', `${event.kind} failure on ${event.url}: ${event.reason}`);
          break;
        case 'run_halted':
          log.error('Pipeline', `Run halted: ${event.reason}`);
          break;
        case 'run_cancelled':
          log.warn('Pipeline', `Run cancelled, ${event.pagesRemaining} pages not started`);
          break;
      }
    },
  };
}

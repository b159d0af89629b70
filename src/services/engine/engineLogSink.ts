import type { Logger } from '../../logging/StructuredLogger';
import type { EngineLogLevel, EngineLogSink } from './SpeechEngine';

/**
 * Routes engine diagnostics into the structured logger. whisper.cpp is chatty
 * at info level, so only warnings and errors keep their level.
 */
export const createEngineLogSink = (logger: Logger, source = 'whisper'): EngineLogSink => {
  return (level: EngineLogLevel, message: string): void => {
    for (const line of message.split('\n')) {
      const text = line.trim();
      if (!text) {
        continue;
      }

      if (level === 'error') {
        logger.error('Engine log', { source, detail: text });
        continue;
      }

      if (level === 'warn') {
        logger.warn('Engine log', { source, detail: text });
        continue;
      }

      logger.debug('Engine log', { source, level, detail: text });
    }
  };
};

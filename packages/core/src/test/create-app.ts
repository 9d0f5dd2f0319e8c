import { TestLoggingLibrary, TestTransport } from 'loglayer';

import { App } from '../main.ts';

/**
 * Creates an app whose log lines are captured in `test.lines`
 */
export function testApp(): { app: App; test: TestLoggingLibrary } {
  const test = new TestLoggingLibrary();
  const log = new TestTransport({
    logger: test,
  });
  const app = new App({ log });

  return { app, test };
}

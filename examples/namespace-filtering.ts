#!/usr/bin/env node

/**
 * Walks a rule string through a few named loggers and prints what gets
 * admitted. Set LOGRULES_RULES to try other rules.
 */

import { loadLoggingConfig } from '../src/config';
import { LoggerFactory, checkAnyLevel, parseRules } from '../src/logging';

async function main(): Promise<void> {
  const config = await loadLoggingConfig(undefined, {
    rules: '*:myns info,warn:myns.* error:*',
    console: { includeTimestamp: false }
  });

  console.log(`=== Rules: ${config.rules} ===\n`);

  const factory = new LoggerFactory(config);
  const names = ['', 'myns', 'myns.cache', 'other'];

  for (const name of names) {
    const logger = factory.createLogger(name);
    logger.debug('debug entry');
    logger.info('info entry');
    logger.warn('warn entry');
    logger.error('error entry', [{ key: 'attempt', value: 1 }]);
    console.log(`-- ${name || '(root)'}: any level below panic admitted? ${checkAnyLevel(logger)}\n`);
  }

  // Rule strings that do not parse
  for (const rules of ['invalid:*', ':*']) {
    const result = parseRules(rules);
    if (!result.success) {
      console.log(`${JSON.stringify(rules)} -> ${result.error.message}`);
    }
  }

  await factory.shutdown();
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});

/**
 * Basic Usage Examples for truthlog
 */

import * as os from 'os';
import * as path from 'path';
import { LeveledLogger, Logger, FILTER_ALL, parseFilter, withContext } from '../src';
import { TestLogger, BufferedRunner } from '../src/testing';

/**
 * Code under test takes a Logger and never knows where messages go.
 */
function connect(logger: Logger, host: string): void {
  const log = withContext(logger, 'host', host);
  log.debug('msg', 'Resolving host.');
  log.info('msg', 'Connected.', 'port', 8080);
}

/**
 * Example 1: Application logging
 */
function example1_leveledLogger() {
  console.log('\n=== Example 1: Leveled Logger ===');

  const logger = new LeveledLogger({ output: process.stdout });
  connect(logger, 'db.local');

  // Turn on debug output at run time
  logger.setFilterLevel(parseFilter(process.env.LOG_LEVELS ?? 'error,info,debug'));
  connect(logger, 'cache.local');
}

/**
 * Example 2: Checking log output in a test
 */
function example2_testLogger() {
  console.log('\n=== Example 2: Test Logger ===');

  const runner = new BufferedRunner();
  const logger = new TestLogger(runner, {
    truth: ['debug {"host":"db.local","msg":"Resolving host."}', 'info  {"host":"db.local","msg":"Connected.","port":"8080"}'],
  });

  connect(logger, 'db.local');
  logger.done();

  console.log('Passed?', !runner.failed); // true
}

/**
 * Example 3: A mismatch and where the actual output goes
 */
function example3_mismatch() {
  console.log('\n=== Example 3: Mismatch Report ===');

  const actualOutputFile = path.join(os.tmpdir(), 'truthlog-example', 'connect.log.generated');
  const runner = new BufferedRunner();
  const logger = new TestLogger(runner, {
    truth: ['info  {"host":"db.local","msg":"Connected.","port":"5432"}'],
    actualOutputFile,
    fieldIgnore: (fields) => (fields['msg'] === 'Resolving host.' ? ['host'] : undefined),
  });

  connect(logger, 'db.local');
  logger.done();

  console.log(runner.output());
  console.log('Actual output written to', actualOutputFile);
}

/**
 * Example 4: Everything at once
 */
function example4_allLevels() {
  console.log('\n=== Example 4: All Levels With Timestamps ===');

  const logger = new LeveledLogger({ output: process.stdout, filterLevel: FILTER_ALL, timestamps: true });
  logger.trace('msg', 'Entering loop.', 'iteration', 1);
  logger.error('msg', 'Request failed.', 'status', 503, 'retry');
}

example1_leveledLogger();
example2_testLogger();
example3_mismatch();
example4_allLevels();

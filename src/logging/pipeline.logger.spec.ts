import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Writable } from 'node:stream';
import { ConfigError } from '../common/pipeline.errors';
import { PipelineLogger, formatTimestamp } from './pipeline.logger';

describe('PipelineLogger', () => {
  const at = new Date(2025, 5, 1, 12, 0, 5);
  let lines: string[];
  let stderr: Writable;

  beforeEach(() => {
    lines = [];
    stderr = new Writable({
      write(chunk: Buffer, _encoding, done) {
        lines.push(chunk.toString());
        done();
      },
    });
  });

  it('should format local timestamps', () => {
    expect(formatTimestamp(new Date(2025, 0, 9, 7, 3, 4))).toBe(
      '2025-01-09 07:03:04',
    );
  });

  it('should write level, pid and context', async () => {
    const logger = new PipelineLogger({
      level: 'info',
      verbose: true,
      stderr,
      now: () => at,
    });

    logger.warn('Frame rejected', 'TelemetryDecoder');
    logger.log('started');
    await logger.close();

    expect(lines).toEqual([
      `2025-06-01 12:00:05 [${process.pid}] WARNING: TelemetryDecoder: Frame rejected\n`,
      `2025-06-01 12:00:05 [${process.pid}] INFO: started\n`,
    ]);
  });

  it('should drop messages below the configured level', async () => {
    const logger = new PipelineLogger({
      level: 'error',
      verbose: true,
      stderr,
      now: () => at,
    });

    logger.debug('noise', 'Ctx');
    logger.log('info', 'Ctx');
    logger.warn('warning', 'Ctx');
    logger.error('broken', undefined, 'Ctx');
    logger.fatal('gone', 'Ctx');
    await logger.close();

    expect(lines.map((line) => line.split('] ')[1])).toEqual([
      'ERROR: Ctx: broken\n',
      'CRITICAL: Ctx: gone\n',
    ]);
  });

  it('should add stacks only at debug level', async () => {
    const logger = new PipelineLogger({
      level: 'debug',
      verbose: true,
      stderr,
      now: () => at,
    });

    logger.error('failed', 'Error: failed\n    at here', 'Runner');
    await logger.close();

    expect(lines).toEqual([
      `2025-06-01 12:00:05 [${process.pid}] ERROR: Runner: failed\nError: failed\n    at here\n`,
    ]);
  });

  it('should leave stacks out above debug level', async () => {
    const logger = new PipelineLogger({
      level: 'info',
      verbose: true,
      stderr,
      now: () => at,
    });

    logger.error('failed', 'Error: failed\n    at here', 'Runner');
    await logger.close();

    expect(lines).toEqual([
      `2025-06-01 12:00:05 [${process.pid}] ERROR: Runner: failed\n`,
    ]);
  });

  it('should report enabled levels', () => {
    const logger = new PipelineLogger({ level: 'warning', verbose: false });

    expect(logger.isEnabled('error')).toBe(true);
    expect(logger.isEnabled('warning')).toBe(true);
    expect(logger.isEnabled('info')).toBe(false);
  });

  it('should stay off stderr unless verbose', async () => {
    const logger = new PipelineLogger({ level: 'debug', verbose: false, stderr });

    logger.log('quiet');
    await logger.close();

    expect(lines).toEqual([]);
  });

  describe('logfile', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-logger-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should append to the logfile', async () => {
      const logfile = path.join(dir, 'pipe.log');
      fs.writeFileSync(logfile, 'earlier\n');
      const logger = new PipelineLogger({
        level: 'info',
        logfile,
        verbose: false,
        now: () => at,
      });

      logger.log({ records: 3 }, 'PipelineEngine');
      await logger.close();

      expect(fs.readFileSync(logfile, 'utf8')).toBe(
        `earlier\n2025-06-01 12:00:05 [${process.pid}] INFO: PipelineEngine: {"records":3}\n`,
      );
    });

    it('should fail with a ConfigError when the logfile cannot be opened', () => {
      const logfile = path.join(dir, 'missing', 'pipe.log');

      expect(
        () => new PipelineLogger({ level: 'info', logfile, verbose: false }),
      ).toThrow(ConfigError);
    });
  });
});

import fs from 'fs';
import os from 'os';
import path from 'path';
import { createTracker } from '../app';
import { buildConfig } from '../config';
import logger from '../utils/logger';

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
  },
}));

describe('createTracker', () => {
  it('runs position-only without an AviationStack key', () => {
    const { orchestrator, history } = createTracker(buildConfig({ HISTORY_FILE: 'none' }));

    expect(orchestrator.isScheduleEnabled()).toBe(false);
    expect(orchestrator.snapshot().scheduleEnabled).toBe(false);
    expect(history.isEmpty()).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('AVIATIONSTACK_API_KEY not set, schedule data disabled');
  });

  it('enables schedule lookups when a key is configured', () => {
    const { orchestrator } = createTracker(buildConfig({
      HISTORY_FILE: 'none',
      SCHEDULE_CACHE_FILE: 'none',
      AVIATIONSTACK_API_KEY: 'test-key',
    }));

    expect(orchestrator.isScheduleEnabled()).toBe(true);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('loads the schedule cache file when schedule lookups are enabled', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flight-watch-app-'));
    const scheduleFile = path.join(dir, 'schedule_cache.json');
    fs.writeFileSync(scheduleFile, '{"entries": "not a list"}');

    try {
      createTracker(buildConfig({
        HISTORY_FILE: 'none',
        SCHEDULE_CACHE_FILE: scheduleFile,
        AVIATIONSTACK_API_KEY: 'test-key',
      }));

      expect(logger.warn).toHaveBeenCalledWith('Ignoring malformed cache file', {
        cache: 'schedule',
        filePath: scheduleFile,
      });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

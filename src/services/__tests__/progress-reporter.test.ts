/**
 * Progress reporter tests
 */

import { ConsoleProgressReporter, RecordingProgressReporter, silentProgress } from '../progress-reporter';

describe('ConsoleProgressReporter', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('should write steps, details and warnings to stdout', () => {
    const progress = new ConsoleProgressReporter();

    progress.step('📖 Step 1: Fetching README...');
    progress.info('✅ README fetched (6 chars)');
    progress.warn('No README found');

    expect(logSpy.mock.calls).toEqual([
      ['\n📖 Step 1: Fetching README...'],
      ['  ✅ README fetched (6 chars)'],
      ['  ⚠️  No README found'],
    ]);
  });

  it('should write nothing through the silent reporter', () => {
    silentProgress.step('hidden');
    silentProgress.info('hidden');
    silentProgress.warn('hidden');

    expect(logSpy).not.toHaveBeenCalled();
  });
});

describe('RecordingProgressReporter', () => {
  it('should tag each line with its kind', () => {
    const progress = new RecordingProgressReporter();

    progress.step('a');
    progress.info('b');
    progress.warn('c');

    expect(progress.lines).toEqual(['step: a', 'info: b', 'warn: c']);
  });
});

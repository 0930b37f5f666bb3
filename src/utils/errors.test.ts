import { jest } from '@jest/globals';
import {
  BrowserLaunchError,
  CrawlError,
  InvalidInputError,
  ReportError,
  handleError,
} from './errors';
import { resetLogger } from './logger';

describe('error taxonomy', () => {
  it('maps each class to a stable exit code', () => {
    expect(InvalidInputError.fromInvalidUrl('x', 'URL could not be parsed').getExitCode()).toBe(1);
    expect(BrowserLaunchError.fromLaunchFailure('chromium', 'missing').getExitCode()).toBe(2);
    expect(CrawlError.fromUnreachableStart('https://example.com/').getExitCode()).toBe(3);
    expect(ReportError.fromWriteFailure('/tmp/r.html', 'EACCES').getExitCode()).toBe(4);
  });

  it('builds user-facing messages', () => {
    expect(InvalidInputError.fromInvalidUrl('ftp://x', 'Unsupported protocol: ftp:').message).toBe(
      'Invalid target URL: "ftp://x". Unsupported protocol: ftp:'
    );
    expect(InvalidInputError.fromInvalidNumber('--depth', '0', 'at least 1').message).toBe(
      '--depth must be at least 1, got: 0'
    );
    expect(CrawlError.fromUnreachableStart('https://example.com/').message).toBe(
      'Could not load the start page: https://example.com/'
    );
    expect(ReportError.fromWriteFailure('/tmp/r.html', 'EACCES').details).toBe(
      'Write error: EACCES. Check that the directory is writable'
    );
  });

  it('names errors after their class', () => {
    expect(CrawlError.fromUnreachableStart('https://example.com/').name).toBe('CrawlError');
  });
});

describe('handleError', () => {
  beforeEach(() => {
    resetLogger();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('logs and exits with the error code', () => {
    expect(() => handleError(BrowserLaunchError.fromLaunchFailure('firefox', 'missing'))).toThrow('exit 2');
    expect(console.error).toHaveBeenCalledWith('[xss-lens] ERROR: Could not launch firefox: missing');
  });

  it('exits with 1 on unexpected errors', () => {
    expect(() => handleError(new Error('boom'))).toThrow('exit 1');
    expect(console.error).toHaveBeenCalledWith('[xss-lens] ERROR: Unexpected error: boom');
  });
});

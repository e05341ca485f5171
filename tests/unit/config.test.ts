import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config';

describe('loadConfig', () => {
  it('should disable logging by default', () => {
    expect(loadConfig({})).toEqual({ logPath: null, debug: false });
  });

  it('should read the log path and debug flag', () => {
    expect(loadConfig({ XCBUILD_PARSER_LOG: '/tmp/parser.log', XCBUILD_PARSER_DEBUG: '1' })).toEqual({
      logPath: '/tmp/parser.log',
      debug: true
    });
  });

  it('should treat a blank log path as unset', () => {
    expect(loadConfig({ XCBUILD_PARSER_LOG: '   ' }).logPath).toBeNull();
  });

  it('should only enable debug for the value 1', () => {
    expect(loadConfig({ XCBUILD_PARSER_DEBUG: 'true' }).debug).toBe(false);
  });
});

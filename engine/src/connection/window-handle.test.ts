/**
 * Window Handle Utilities Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  buildTmuxHandle,
  buildMacHandle,
  buildX11Handle,
  parseWindowHandle,
  handleKind,
  handleBelongsTo,
} from './window-handle.js';
import { WindowHandlePrefix } from './constants.js';

describe('window-handle', () => {
  describe('builders', () => {
    it('should build a tmux handle from the pane target', () => {
      const handle = buildTmuxHandle({ paneTty: '/dev/pts/3', sessionName: 'work', windowIndex: 2, paneIndex: 1 });
      expect(handle).toBe('TMUX:/dev/pts/3|work|2|1');
    });

    it('should build a mac handle', () => {
      expect(buildMacHandle('iTerm2', '4711')).toBe('MAC:iTerm2:4711');
    });

    it('should build an X11 handle', () => {
      expect(buildX11Handle('0x04400006')).toBe('X11:0x04400006');
    });
  });

  describe('parseWindowHandle', () => {
    it('should parse a tmux handle', () => {
      expect(parseWindowHandle('TMUX:/dev/pts/3|work|2|1')).toEqual({
        prefix: WindowHandlePrefix.TMUX,
        paneTty: '/dev/pts/3',
        sessionName: 'work',
        windowIndex: 2,
        paneIndex: 1,
      });
    });

    it('should keep pipes inside the session name', () => {
      const parsed = parseWindowHandle('TMUX:/dev/ttys004|a|b|10|0');
      expect(parsed).toEqual({
        prefix: WindowHandlePrefix.TMUX,
        paneTty: '/dev/ttys004',
        sessionName: 'a|b',
        windowIndex: 10,
        paneIndex: 0,
      });
    });

    it('should reject tmux handles with missing or non-numeric indexes', () => {
      expect(parseWindowHandle('TMUX:/dev/pts/3|work|2')).toBeNull();
      expect(parseWindowHandle('TMUX:/dev/pts/3|work|x|1')).toBeNull();
      expect(parseWindowHandle('TMUX:pts/3|work|2|1')).toBeNull();
    });

    it('should parse a mac handle', () => {
      expect(parseWindowHandle('MAC:Terminal:123')).toEqual({
        prefix: WindowHandlePrefix.MAC,
        app: 'Terminal',
        windowId: '123',
      });
    });

    it('should reject mac handles for unknown apps or ids', () => {
      expect(parseWindowHandle('MAC:Hyper:123')).toBeNull();
      expect(parseWindowHandle('MAC:Terminal:abc')).toBeNull();
      expect(parseWindowHandle('MAC:Terminal')).toBeNull();
    });

    it('should parse an X11 handle', () => {
      expect(parseWindowHandle('X11:0x04400006')).toEqual({
        prefix: WindowHandlePrefix.X11,
        windowId: '0x04400006',
      });
    });

    it('should reject X11 handles that are not hex window ids', () => {
      expect(parseWindowHandle('X11:12345')).toBeNull();
      expect(parseWindowHandle('X11:')).toBeNull();
    });

    it('should reject empty, unprefixed and unknown handles', () => {
      expect(parseWindowHandle('')).toBeNull();
      expect(parseWindowHandle('0x04400006')).toBeNull();
      expect(parseWindowHandle('KITTY:42')).toBeNull();
    });
  });

  describe('handleKind', () => {
    it('should map each prefix to the strategy that produced it', () => {
      expect(handleKind('TMUX:/dev/pts/3|work|2|1')).toBe('multiplexer');
      expect(handleKind('MAC:iTerm2:4711')).toBe('mac-terminal');
      expect(handleKind('X11:0x04400006')).toBe('linux-wm');
    });

    it('should return null for malformed handles', () => {
      expect(handleKind('MAC:iTerm2:')).toBeNull();
    });
  });

  describe('handleBelongsTo', () => {
    it('should accept a handle for its own kind only', () => {
      const handle = buildX11Handle('0x1');
      expect(handleBelongsTo(handle, 'linux-wm')).toBe(true);
      expect(handleBelongsTo(handle, 'multiplexer')).toBe(false);
      expect(handleBelongsTo(handle, 'mac-terminal')).toBe(false);
      expect(handleBelongsTo(handle, 'unsupported')).toBe(false);
    });
  });
});

/**
 * Tests for process-detection module
 */

import { describe, it, expect } from '@jest/globals';
import { findProcessesHoldingFile, getControllingTty, normalizeTtyPath } from './process-detection.js';
import { createFakeRunner, commandError } from '../testing/fake-runner.js';

const MARKER = '/home/dev/project/.notes.md.swp';

describe('findProcessesHoldingFile', () => {
  it('returns the pids printed by lsof -t', async () => {
    const runner = createFakeRunner({ [`lsof -t -- ${MARKER}`]: '4242\n5151\n' });
    await expect(findProcessesHoldingFile(runner.run, MARKER)).resolves.toEqual([4242, 5151]);
  });

  it('excludes the current process and duplicates', async () => {
    const runner = createFakeRunner({
      [`lsof -t -- ${MARKER}`]: `${process.pid}\n4242\n4242\n`,
    });
    await expect(findProcessesHoldingFile(runner.run, MARKER)).resolves.toEqual([4242]);
  });

  it('ignores lines that are not pids', async () => {
    const runner = createFakeRunner({ [`lsof -t -- ${MARKER}`]: 'lsof: WARNING\n 77 \n' });
    await expect(findProcessesHoldingFile(runner.run, MARKER)).resolves.toEqual([77]);
  });

  it('returns nothing when lsof exits non-zero', async () => {
    const runner = createFakeRunner({ lsof: commandError('lsof -t') });
    await expect(findProcessesHoldingFile(runner.run, MARKER)).resolves.toEqual([]);
  });

  it('returns nothing when lsof is missing', async () => {
    const runner = createFakeRunner();
    await expect(findProcessesHoldingFile(runner.run, MARKER)).resolves.toEqual([]);
  });
});

describe('normalizeTtyPath', () => {
  it('prefixes /dev/', () => {
    expect(normalizeTtyPath('pts/3')).toBe('/dev/pts/3');
    expect(normalizeTtyPath('ttys001')).toBe('/dev/ttys001');
  });

  it('keeps full device paths', () => {
    expect(normalizeTtyPath('/dev/pts/3')).toBe('/dev/pts/3');
  });
});

describe('getControllingTty', () => {
  it('returns the device path for a process with a terminal', async () => {
    const runner = createFakeRunner({ 'ps -o tty= -p 4242': 'pts/3\n' });
    await expect(getControllingTty(runner.run, 4242)).resolves.toBe('/dev/pts/3');
  });

  it('returns null for processes without a terminal', async () => {
    const linux = createFakeRunner({ 'ps -o tty= -p 1': '?\n' });
    const mac = createFakeRunner({ 'ps -o tty= -p 1': '??\n' });
    await expect(getControllingTty(linux.run, 1)).resolves.toBeNull();
    await expect(getControllingTty(mac.run, 1)).resolves.toBeNull();
  });

  it('returns null when ps prints nothing', async () => {
    const runner = createFakeRunner({ 'ps -o tty= -p 4242': '' });
    await expect(getControllingTty(runner.run, 4242)).resolves.toBeNull();
  });

  it('returns null when ps fails', async () => {
    const runner = createFakeRunner({ ps: commandError('ps') });
    await expect(getControllingTty(runner.run, 4242)).resolves.toBeNull();
  });

  it('does not run ps for non-positive pids', async () => {
    const runner = createFakeRunner();
    await expect(getControllingTty(runner.run, 0)).resolves.toBeNull();
    expect(runner.calls).toEqual([]);
  });
});

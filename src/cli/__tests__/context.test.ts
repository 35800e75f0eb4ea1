/**
 * Tests for the command context factory
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import chalk from 'chalk';

import { createContext } from '../context.js';

describe('createContext', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs, warns and hides debug output by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const ctx = createContext({ verbose: false, json: false });

    ctx.log('hello');
    ctx.debug('hidden');
    ctx.warn('careful');

    expect(log.mock.calls).toEqual([['hello']]);
    expect(warn).toHaveBeenCalledWith(chalk.yellow('Warning: careful'));
  });

  it('shows debug output with --verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createContext({ verbose: true, json: false }).debug('details');

    expect(log).toHaveBeenCalledWith(chalk.dim('[debug] details'));
  });

  it('keeps stdout clean and emits JSON errors with --json', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const ctx = createContext({ verbose: true, json: true });

    ctx.log('hello');
    ctx.debug('details');
    ctx.warn('careful');
    ctx.error('broken');

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith(JSON.stringify({ error: 'broken' }));
  });
});

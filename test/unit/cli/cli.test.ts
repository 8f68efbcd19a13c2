import { describe, it, expect, vi, afterEach } from 'vitest';
import { createCLI } from '../../../src/cli/index.js';

describe('CLI', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register every command', () => {
    const names = createCLI().commands.map(c => c.name());
    expect(names).toEqual(['resolve', 'rules', 'transcribe', 'init']);
  });

  it('should print the rule table in priority order', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createCLI().parseAsync(['node', 'voicekit', 'rules']);

    const lines = log.mock.calls.map(call => String(call[0]));
    expect(lines[0]).toBe('1. STOP     stop, freeze, halt, hold, quit, enough  (negated: FOLLOW)');
    expect(lines[1]).toBe('2. JUMP     jump, leap, hop  (negated: IDLE)');
    expect(lines[5]).toBe("\nNegation markers: don't, do not");
  });

  it('should print the rule table as JSON', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createCLI().parseAsync(['node', 'voicekit', 'rules', '--json']);

    const parsed: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(parsed).toMatchObject({ negationMarkers: ["don't", 'do not'] });
  });
});

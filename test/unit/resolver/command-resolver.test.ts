/**
 * CommandResolver — Unit Tests
 *
 * Tests tier ordering (cache → heuristic → remote), cache population and
 * idempotence, remote reply normalization, and failure handling.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CommandResolver, RESOLVER_INSTRUCTION } from '../../../src/resolver/command-resolver.js';
import { ActionDispatcher } from '../../../src/resolver/action-dispatcher.js';
import { EventBus } from '../../../src/core/events.js';
import { EmptyCommandError, RemoteResolutionError } from '../../../src/core/errors.js';
import { MockProvider } from '../../helpers/mock-provider.js';

describe('CommandResolver', () => {
  let provider: MockProvider;
  let resolver: CommandResolver;

  beforeEach(() => {
    provider = new MockProvider(['BACKOFF']);
    resolver = new CommandResolver({ provider });
  });

  // ── normalization ─────────────────────────────────────────

  describe('empty input', () => {
    it('rejects with EmptyCommandError and writes nothing', async () => {
      await expect(resolver.resolve('   ')).rejects.toBeInstanceOf(EmptyCommandError);
      expect(resolver.getCache().size).toBe(0);
      expect(provider.calls).toHaveLength(0);
    });
  });

  // ── heuristic tier ────────────────────────────────────────

  describe('heuristic tier', () => {
    it.each([
      ['stop and jump', 'STOP'],
      ["don't stop", 'FOLLOW'],
      ['please follow me', 'FOLLOW'],
      ['back off now', 'BACKOFF'],
    ])('"%s" → %s without a remote call', async (text, expected) => {
      const result = await resolver.resolve(text);
      expect(result).toEqual({ key: text, action: expected, tier: 'heuristic' });
      expect(provider.calls).toHaveLength(0);
    });

    it('caches heuristic answers under the normalized key', async () => {
      await resolver.resolve('  Please FOLLOW me ');
      expect(resolver.getCache().toObject()).toEqual({ 'please follow me': 'FOLLOW' });
    });

    it('can leave heuristic answers out of the cache', async () => {
      resolver = new CommandResolver({ provider, cacheHeuristicMatches: false });
      await resolver.resolve('freeze');
      const second = await resolver.resolve('freeze');

      expect(second.tier).toBe('heuristic');
      expect(resolver.getCache().size).toBe(0);
    });
  });

  // ── cache tier ────────────────────────────────────────────

  describe('cache tier', () => {
    it('answers a repeated phrase from the cache without classifying again', async () => {
      const classify = vi.spyOn(resolver, 'classify');

      const first = await resolver.resolve('please follow me');
      const second = await resolver.resolve('Please follow me');

      expect(first.action).toBe('FOLLOW');
      expect(second).toEqual({ key: 'please follow me', action: 'FOLLOW', tier: 'cache' });
      expect(classify).toHaveBeenCalledTimes(1);
    });

    it('answers a repeated remote phrase without a second call', async () => {
      await resolver.resolve('do a barrel roll');
      const second = await resolver.resolve('do a barrel roll');

      expect(second.tier).toBe('cache');
      expect(second.action).toBe('BACKOFF');
      expect(provider.calls).toHaveLength(1);
    });

    it('uses a pre-populated cache ahead of the rules', async () => {
      resolver.getCache().set('stop', 'JUMP');
      const result = await resolver.resolve('stop');
      expect(result).toEqual({ key: 'stop', action: 'JUMP', tier: 'cache' });
    });
  });

  // ── remote tier ───────────────────────────────────────────

  describe('remote tier', () => {
    it('sends the fixed instruction and the raw phrase', async () => {
      resolver = new CommandResolver({ provider, model: 'gpt-4o-mini' });
      await resolver.resolve('  Do A Barrel Roll ');

      expect(provider.calls).toHaveLength(1);
      expect(provider.calls[0]).toMatchObject({
        messages: [
          { role: 'system', content: RESOLVER_INSTRUCTION },
          { role: 'user', content: 'Do A Barrel Roll' },
        ],
        model: 'gpt-4o-mini',
        maxTokens: 4,
        temperature: 0,
      });
    });

    it('normalizes the reply to a trimmed uppercase token and caches it', async () => {
      provider = new MockProvider(['  jump \n']);
      resolver = new CommandResolver({ provider });

      const result = await resolver.resolve('do a barrel roll');
      expect(result).toEqual({ key: 'do a barrel roll', action: 'JUMP', tier: 'remote' });
      expect(resolver.getCache().get('do a barrel roll')).toBe('JUMP');
    });

    it('caches a non-empty token even outside the action set', async () => {
      provider = new MockProvider(['dance']);
      resolver = new CommandResolver({ provider });

      const result = await resolver.resolve('do a barrel roll');
      expect(result.action).toBe('DANCE');
      expect(resolver.getCache().get('do a barrel roll')).toBe('DANCE');
    });

    it('does not cache an empty reply', async () => {
      provider = new MockProvider(['  ']);
      resolver = new CommandResolver({ provider });

      const result = await resolver.resolve('do a barrel roll');
      expect(result).toEqual({ key: 'do a barrel roll', action: '', tier: 'remote' });
      expect(resolver.getCache().has('do a barrel roll')).toBe(false);
    });

    it('wraps provider failures and does not cache', async () => {
      provider = new MockProvider([new Error('network down'), 'JUMP']);
      resolver = new CommandResolver({ provider });

      await expect(resolver.resolve('do a barrel roll')).rejects.toBeInstanceOf(RemoteResolutionError);
      expect(resolver.getCache().size).toBe(0);

      const retry = await resolver.resolve('do a barrel roll');
      expect(retry).toEqual({ key: 'do a barrel roll', action: 'JUMP', tier: 'remote' });
    });

    it('fails when no provider is configured', async () => {
      resolver = new CommandResolver();
      await expect(resolver.resolve('do a barrel roll')).rejects.toThrow('No language-model provider configured');
    });

    it('keeps one entry when the same phrase resolves concurrently', async () => {
      provider = new MockProvider(['STOP']);
      resolver = new CommandResolver({ provider });

      const results = await Promise.all([resolver.resolve('do a barrel roll'), resolver.resolve('do a barrel roll')]);
      expect(results.map(r => r.action)).toEqual(['STOP', 'STOP']);
      expect(resolver.getCache().size).toBe(1);
    });
  });

  // ── events ────────────────────────────────────────────────

  describe('events', () => {
    it('emits command:resolved with the tier', async () => {
      const events = new EventBus();
      const spy = vi.fn();
      events.on('command:resolved', spy);
      resolver = new CommandResolver({ provider, events });

      await resolver.resolve('halt');
      expect(spy).toHaveBeenCalledWith({ phrase: 'halt', action: 'STOP', tier: 'heuristic' });
    });

    it('emits command:failed when the remote tier fails', async () => {
      const events = new EventBus();
      const spy = vi.fn();
      events.on('command:failed', spy);
      resolver = new CommandResolver({ provider: new MockProvider([new Error('boom')]), events });

      await expect(resolver.resolve('do a barrel roll')).rejects.toThrow(RemoteResolutionError);
      expect(spy).toHaveBeenCalledWith({ phrase: 'do a barrel roll', error: 'boom' });
    });
  });

  // ── with dispatch ─────────────────────────────────────────

  it('lands on IDLE when an unrecognized phrase meets a failing remote', async () => {
    const handlers = { IDLE: vi.fn(), FOLLOW: vi.fn() };
    const dispatcher = new ActionDispatcher(handlers);
    resolver = new CommandResolver({ provider: new MockProvider([new Error('unreachable')]) });

    const action = await resolver.resolve('sing a song').then(
      r => dispatcher.dispatch(r.action),
      err => dispatcher.dispatchFailure(err),
    );

    expect(action).toBe('IDLE');
    expect(handlers.IDLE).toHaveBeenCalledOnce();
    expect(handlers.FOLLOW).not.toHaveBeenCalled();
  });
});

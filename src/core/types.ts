import { z } from 'zod';

// ===== Configuration =====

export const VoiceKitConfigSchema = z.object({
  providers: z.object({
    openaiApiKey: z.string().optional(),
    baseUrl: z.string().optional(),
  }).default({}),
  capture: z.object({
    /** Requested device rate; the opened device may report a different one */
    sampleRate: z.number().int().min(8000).max(192000).default(16000),
    loopSeconds: z.number().int().min(1).max(300).default(30),
    preRollSeconds: z.number().min(0).max(5).default(0.5),
    maxRecordSeconds: z.number().positive().max(120).default(10),
    minRecordSeconds: z.number().min(0).default(0.25),
    readinessAttempts: z.number().int().min(1).default(200),
    device: z.string().optional(),
  }).default({}),
  resolver: z.object({
    model: z.string().default('gpt-4o-mini'),
    maxTokens: z.number().int().min(1).default(4),
    temperature: z.number().min(0).max(2).default(0),
    cacheHeuristicMatches: z.boolean().default(true),
  }).default({}),
  transcription: z.object({
    model: z.string().default('whisper-1'),
    language: z.string().optional(),
  }).default({}),
  controller: z.object({
    tickIntervalMs: z.number().int().min(1).default(16),
    cancelStale: z.boolean().default(false),
  }).default({}),
  ui: z.object({
    verbose: z.boolean().default(false),
  }).default({}),
});

export type VoiceKitConfig = z.infer<typeof VoiceKitConfigSchema>;

// ===== Events =====

export type ResolutionTier = 'cache' | 'heuristic' | 'remote';

export interface VoiceKitEvents {
  'capture:started': { sampleRate: number; channels: number; capacity: number };
  'capture:unavailable': { code: string; message: string };
  'capture:stopped': Record<string, never>;
  'session:started': { startCursor: number; timestamp: number };
  'session:rejected': { reason: string };
  'session:discarded': { frames: number; durationSec: number };
  'session:extracted': { frames: number; durationSec: number };
  'transcription:complete': { text: string };
  'transcription:failed': { error: string };
  'command:resolved': { phrase: string; action: string; tier: ResolutionTier };
  'command:failed': { phrase: string; error: string };
  'action:dispatched': { action: string; token: string };
  'action:unknown': { token: string };
  'pipeline:cancelled': { pipelineId: string };
  'entry:opened': Record<string, never>;
  'entry:closed': Record<string, never>;
}

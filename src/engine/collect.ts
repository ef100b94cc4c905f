import { buildMessages } from './buildPrompt';
import { parseResponse } from './parseResponse';
import { dedupeAndFilter } from './filter';
import { createLogger, type Logger } from '../util/logger';
import type { ProspectGenerator } from '../openai/generator';
import type { CampaignBrief } from '../prompts/system';
import type { CollectionResult, ProspectRecord, SeedSegment } from '../types';

export interface CollectOptions {
  segments: readonly SeedSegment[];
  targetCount: number;
  batchSize: number;
  maxCalls: number;
  avoidWindow: number;
  maxAvoidChars: number;
  pacingMs: number;
  emptyBatchPauseMs: number;
  brief?: CampaignBrief;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

interface LoopState {
  results: ProspectRecord[];
  seen: Set<string>;
  calls: number;
  segmentIndex: number;
  emptyBatches: number;
  duplicateBatches: number;
  segmentsUsed: string[];
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Calls the generator once per iteration, cycling through the segments, until
 * `targetCount` prospects are collected or `maxCalls` calls were made. The
 * result is trimmed to `targetCount`. Generator failures are not caught.
 *
 * An empty parse pauses for `emptyBatchPauseMs` and moves on; the segment index
 * has already advanced, so the next call uses the next segment.
 */
export async function collectProspects(
  generator: ProspectGenerator,
  opts: CollectOptions
): Promise<CollectionResult> {
  if (opts.segments.length === 0) throw new Error('collectProspects needs at least one segment');
  const sleep = opts.sleep ?? defaultSleep;
  const logger = opts.logger ?? createLogger('COLLECT');

  const state: LoopState = {
    results: [],
    seen: new Set<string>(),
    calls: 0,
    segmentIndex: 0,
    emptyBatches: 0,
    duplicateBatches: 0,
    segmentsUsed: []
  };

  while (state.results.length < opts.targetCount && state.calls < opts.maxCalls) {
    const segment = opts.segments[state.segmentIndex % opts.segments.length];
    state.segmentIndex++;

    const avoid = state.results.slice(-opts.avoidWindow).map(r => r.name);
    const messages = buildMessages(segment, avoid, {
      batchSize: opts.batchSize,
      maxAvoidChars: opts.maxAvoidChars,
      brief: opts.brief
    });
    const text = await generator.generate(messages);
    state.calls++;
    state.segmentsUsed.push(segment.title);

    const batch = parseResponse(text);
    if (batch.length === 0) {
      state.emptyBatches++;
      logger.warn(`Empty batch on call ${state.calls}, segment ${segment.title}. Retrying after short pause.`);
      await sleep(opts.emptyBatchPauseMs);
      continue;
    }

    const fresh = dedupeAndFilter(batch, state.seen);
    if (fresh.length === 0) {
      state.duplicateBatches++;
      logger.info(`No new unique companies found in batch ${state.calls}.`);
      continue;
    }

    state.results.push(...fresh);
    logger.info(`${fresh.length} added (total ${state.results.length}). Segment: ${segment.title}`);
    await sleep(opts.pacingMs);
  }

  return {
    prospects: state.results.slice(0, opts.targetCount),
    calls: state.calls,
    emptyBatches: state.emptyBatches,
    duplicateBatches: state.duplicateBatches,
    segmentsUsed: state.segmentsUsed
  };
}

#!/usr/bin/env node
import { CFG, EFFECTIVE_CHAT_MODEL } from '../config';
import { collectProspects } from '../engine/collect';
import { OpenAIProspectGenerator } from '../openai/generator';
import { writeProspectsCsv } from '../output/csv';
import { SEED_SEGMENTS } from '../prompts/segments';
import { saveJSON } from '../util/fileCache';
import { createLogger, log } from '../util/logger';

const logger = createLogger('CLI');

async function main(): Promise<void> {
  log('== Generating pea protein prospects ==');
  log(`Model: ${EFFECTIVE_CHAT_MODEL} | target ${CFG.TARGET_COUNT} | batch ${CFG.BATCH_SIZE} | max calls ${CFG.MAX_CALLS}`);
  const startTime = Date.now();

  const generator = new OpenAIProspectGenerator();
  const result = await collectProspects(generator, {
    segments: SEED_SEGMENTS,
    targetCount: CFG.TARGET_COUNT,
    batchSize: CFG.BATCH_SIZE,
    maxCalls: CFG.MAX_CALLS,
    avoidWindow: CFG.AVOID_ROLLING_MAX,
    maxAvoidChars: CFG.AVOID_TEXT_MAX_CHARS,
    pacingMs: CFG.PACING_MS,
    emptyBatchPauseMs: CFG.EMPTY_BATCH_PAUSE_MS
  });

  await writeProspectsCsv(CFG.OUTPUT_CSV, result.prospects);

  const usage = generator.getTokenUsage();
  const reportFile = saveJSON(CFG.RUNS_DIR, `run-${startTime}`, {
    model: EFFECTIVE_CHAT_MODEL,
    output: CFG.OUTPUT_CSV,
    target: CFG.TARGET_COUNT,
    saved: result.prospects.length,
    calls: result.calls,
    emptyBatches: result.emptyBatches,
    duplicateBatches: result.duplicateBatches,
    segmentsUsed: result.segmentsUsed,
    tokens: usage,
    durationMs: Date.now() - startTime
  });

  log(`\nSaved ${result.prospects.length} prospects to ${CFG.OUTPUT_CSV}`);
  log(`Calls: ${result.calls} | tokens in/out: ${usage.inputTokens}/${usage.outputTokens} | report: ${reportFile}`);
}

main().catch(error => {
  logger.error('FATAL ERROR:', error);
  process.exit(1);
});

/**
 * Run one assessment end to end against local collaborators.
 *
 * Run: npm run assess -- scripts/sample-submission.json [run-id]
 */
import './load-env.js';

import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import {
  createLogSink,
  InMemoryPiiStore,
  PerplexityResearchClient,
  runPipeline,
  StageLogger,
  toAssessmentResponse,
} from '@exitready/agents';
import { createOllamaGenerator, isJsonObject } from '@exitready/llm';

async function main(): Promise<void> {
  const [file, runId = randomUUID()] = process.argv.slice(2);
  if (!file) {
    console.error('Usage: npm run assess -- <submission.json> [run-id]');
    process.exitCode = 1;
    return;
  }

  const submission: unknown = JSON.parse(fs.readFileSync(path.resolve(process.cwd(), file), 'utf-8'));
  if (!isJsonObject(submission)) {
    console.error(`${file} does not contain a JSON object`);
    process.exitCode = 1;
    return;
  }

  const sinkLogger = new StageLogger('intake-sink');
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const context = await runPipeline(
    { runId, submission },
    {
      generator: createOllamaGenerator(),
      research: new PerplexityResearchClient(),
      piiStore: new InMemoryPiiStore(),
      sinks: [createLogSink(sinkLogger)],
    },
    { signal: controller.signal },
  );

  const entries = [...sinkLogger.getLogs(), ...(context.logEntries ?? [])].filter((entry) => entry.level !== 'debug');
  for (const entry of entries) {
    console.log(`${entry.timestamp.toISOString()} [${entry.scope}] ${entry.level.toUpperCase()} ${entry.message}`, entry.data ?? '');
  }
  for (const line of context.log) console.log(line);
  const response = toAssessmentResponse(context);
  if (response.status === 'completed') {
    console.log(`\n${response.report}\n`);
    console.log(
      `Overall ${response.scores.overall}/10 (${response.readinessTier}), QA ${response.qaApproved ? 'approved' : 'not approved'} at ${response.qualityScore}/10`,
    );
  } else {
    console.error(`Run failed at ${response.error.stage}: ${response.error.kind}: ${response.error.message}`);
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});

import { resolve } from 'node:path';
import { loadConfig } from '@tessera/schemas/src/config-loader.js';
import { createLlmClient } from '@tessera/core/src/llm/llm-client.js';
import { createPipeline } from '@tessera/core/src/orchestration/pipeline.js';
import { createBaselineAnswerer } from '@tessera/core/src/answer/baseline-answer.js';

const DEFAULT_QUESTION = 'What is the capital of France?';
const DEFAULT_DOCS = [
  'Paris is the capital and largest city of France.',
  "The city of Paris serves as France's capital, located in the north.",
];

async function main(): Promise<void> {
  const configPath = process.argv[2] ?? resolve(process.cwd(), 'config', 'tessera.mock.json');
  const question = process.argv[3] ?? DEFAULT_QUESTION;
  const docs = process.argv.length > 4 ? process.argv.slice(4) : DEFAULT_DOCS;

  console.log('=== Tessera Pipeline Runner ===\n');
  console.log(`Config: ${configPath}`);
  console.log(`Question: ${question}`);
  console.log(`Retrieved documents: ${String(docs.length)}\n`);

  const startTime = Date.now();

  const config = await loadConfig(configPath);
  console.log(`Provider: ${config.llm.provider} (${config.llm.model})`);
  console.log(`Grouper: ${config.consolidation.grouper}\n`);

  const llmClient = createLlmClient(config.llm);
  const pipeline = createPipeline({ llmClient, config });

  console.log('--- Baseline (no evidence) ---');
  const baseline = await createBaselineAnswerer(llmClient).answer(question);
  console.log(`  ${baseline}\n`);

  console.log('Running pipeline...\n');
  const result = await pipeline.runDetailed(question, docs);
  const elapsed = Date.now() - startTime;

  console.log('--- Internal Knowledge ---');
  if (result.internalPassages.length === 0) {
    console.log('  (none)');
  }
  for (const passage of result.internalPassages) {
    console.log(`  ${passage.id}: ${passage.text}`);
  }

  console.log('\n--- Clusters ---');
  if (result.consolidation.degraded) {
    console.log('  (grouping unparsable, one cluster per passage)');
  }
  for (const cluster of result.consolidation.clusters) {
    const { internal, external } = cluster.provenance;
    console.log(`  ${cluster.id}: ${cluster.consensus}`);
    console.log(
      `    passages: ${cluster.passages.map((p) => p.id).join(', ')} (${String(internal)} internal, ${String(external)} external)`,
    );
    if (cluster.conflictsWith.length > 0) {
      console.log(`    conflicts with: ${cluster.conflictsWith.join(', ')}`);
    }
  }

  const { answer } = result;
  console.log('\n--- Answer ---');
  console.log(`  ${answer.text}`);
  console.log(`  Confidence: ${answer.confidence.toFixed(2)}`);
  console.log(`  Citations: ${answer.citations.map((c) => c.clusterId).join(', ') || '(none)'}`);
  if (answer.conflicting) {
    console.log('  Evidence conflicts');
  }
  for (const note of answer.notes) {
    console.log(`  Note: ${note}`);
  }

  console.log(`\n=== Pipeline completed in ${String(elapsed)}ms ===`);
}

main().catch((error: unknown) => {
  console.error('Pipeline failed:', error);
  process.exit(1);
});

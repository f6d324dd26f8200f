#!/usr/bin/env tsx
/**
 * Generate a plan from a JSON file holding { "profile": {...}, "goal": {...} }
 */
import * as fs from 'fs';
import { createContainer } from '../src/services/index.js';
import { handleGenerate } from '../src/tools/generate.js';
import { isRecord } from '../src/utils/json.js';

const [inputPath, ...flags] = process.argv.slice(2);

if (!inputPath) {
  console.error('Usage: npx tsx scripts/generate-plan.ts <input.json> [--path templates|hybrid|full_llm|two_tier] [--days N] [--persist]');
  process.exit(1);
}

function flagValue(name: string): string | undefined {
  const index = flags.indexOf(name);
  return index >= 0 ? flags[index + 1] : undefined;
}

async function main(file: string): Promise<void> {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (!isRecord(raw)) {
    throw new Error(`${file} must contain a JSON object`);
  }

  const days = flagValue('--days');
  const args: Record<string, unknown> = {
    ...raw,
    persist: flags.includes('--persist'),
    ...(flagValue('--path') !== undefined && { path: flagValue('--path') }),
    ...(days !== undefined && { daysAhead: Number(days) }),
  };

  const container = createContainer();
  try {
    const result = await handleGenerate(args, container);

    console.log(`\n📋 Plan for "${result.coverage.background}" via ${result.path}\n`);
    console.log(`   Coverage: ${result.coverage.score} (${result.coverage.tier})`);
    console.log(`   Status: ${result.status}`);
    console.log(`   Tasks: ${result.tasks.length}`);
    console.log(`   LLM cost: $${result.costUsd.toFixed(4)}`);
    if (result.stateHistory) {
      console.log(`   States: ${result.stateHistory.join(' → ')}`);
    }
    if (result.persisted) {
      console.log(`   Stored: ${result.persisted.created} new, ${result.persisted.existing} existing`);
    }
    console.log('\n' + '─'.repeat(70));

    for (const task of result.tasks) {
      console.log(`\n${task.scheduledDate ?? '----------'}  [P${task.priority}] ${task.title}`);
      console.log(`   ${task.timeboxMinutes} min · ${task.deliverableType} · ${task.source}`);
      if (task.specificResource) {
        console.log(`   → ${task.specificResource}`);
      }
    }
    console.log('');
  } finally {
    container.clear();
  }
}

main(inputPath).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

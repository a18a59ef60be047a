import { config } from 'dotenv';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  buildEncounterPrompts,
  createAnthropicClient,
  createNoteGenerator,
  generateEncounterNotes,
  loadNotesConfig,
  parseBundle,
  requireApiKey,
} from '@encounter-scribe/shared';
import { USAGE, parseCliArgs, type CliArgs } from './args';
import { formatNoteFile, formatPromptFile, noteFileName } from './output';

config({ path: '.env.local' });
config();

async function main() {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(`\n${USAGE}`);
    process.exit(2);
  }

  if (args.help) {
    console.log(USAGE);
    return;
  }

  if (!existsSync(args.bundle)) {
    console.error(`Unable to find bundle file: ${args.bundle}`);
    process.exit(2);
  }

  const notesConfig = loadNotesConfig(process.env);
  const bundle = parseBundle(JSON.parse(readFileSync(args.bundle, 'utf-8')));

  const prompts = buildEncounterPrompts(bundle, {
    selection: args.documentedOnly ? 'documented' : 'all',
    contextTokens: notesConfig.contextTokens,
  });
  console.log(`Found ${prompts.length} encounters in ${args.bundle} (${bundle.entries.length} resources)`);

  const outDir = args.out ?? notesConfig.outputDir;
  if (!existsSync(outDir)) {
    mkdirSync(outDir, { recursive: true });
  }

  if (args.dryRun) {
    for (const prompt of prompts) {
      writeFileSync(join(outDir, noteFileName(prompt, '.prompt.md')), formatPromptFile(prompt));
    }
    console.log(`Wrote ${prompts.length} prompts to ${outDir}`);
    return;
  }

  const client = createAnthropicClient({
    apiKey: requireApiKey(notesConfig),
    maxRetries: notesConfig.maxRetries,
    timeoutMs: notesConfig.timeoutMs,
  });
  const generate = createNoteGenerator(client, {
    model: args.model ?? notesConfig.model,
    maxTokens: notesConfig.maxTokens,
  });

  const result = await generateEncounterNotes(prompts, generate);
  let written = 0;
  for (const note of result.notes) {
    if (note.note === undefined) continue;
    writeFileSync(join(outDir, noteFileName(note)), formatNoteFile(note));
    written++;
  }

  console.log(`\nWrote ${written} notes to ${outDir}`);
  if (result.failed > 0) {
    console.error(`${result.failed} encounters failed`);
    process.exitCode = 1;
  }
}

main().catch(err => {
  console.error('Note generation failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});

import type { EncounterNote, EncounterPrompt } from '@encounter-scribe/shared';

/** `<date>-<encounterId><suffix>`, with anything outside `[A-Za-z0-9.-]` replaced. */
export function noteFileName(item: { encounterId: string; date?: string }, suffix = '.md'): string {
  const stem = `${item.date ?? 'undated'}-${item.encounterId}`.replace(/[^A-Za-z0-9.-]/g, '_');
  return `${stem}${suffix}`;
}

export function formatPromptFile(prompt: EncounterPrompt): string {
  return [
    `# Encounter ${prompt.encounterId} (${prompt.request.kind})`,
    '',
    '## System',
    '',
    prompt.request.system,
    '',
    '## Prompt',
    '',
    prompt.request.prompt,
    '',
  ].join('\n');
}

export function formatNoteFile(note: EncounterNote): string {
  const heading = note.date
    ? `# Encounter ${note.encounterId}, ${note.date}`
    : `# Encounter ${note.encounterId}`;
  return `${heading}\n\n${note.note ?? ''}\n`;
}

import type { Draft } from '../domain';
import type { CompletionProvider } from './ports';

export const DRAFT_SYSTEM_PROMPT = `You are a professional communication drafting assistant.
Generate a draft based on the user's instruction and context data.
Format your response as:
To: [recipient]
Subject: [subject line]

[body text]

Keep the tone professional but natural. Be concise.`;

export function buildDraftUserPrompt(instruction: string, contextData: string): string {
  const prompt = `Instruction: ${instruction}`;
  return contextData ? `${prompt}\n\nContext data:\n${contextData}` : prompt;
}

export async function generateDraft(input: {
  signal: AbortSignal;
  provider: CompletionProvider;
  instruction: string;
  contextData: string;
}): Promise<Draft> {
  const raw = await input.provider.complete(
    input.signal,
    DRAFT_SYSTEM_PROMPT,
    buildDraftUserPrompt(input.instruction, input.contextData)
  );
  return parseDraft(raw);
}

// Blank lines between the To: and Subject: headers are skipped.
export function parseDraft(raw: string): Draft {
  const draft: Draft = { to: '', subject: '', body: '', raw };
  const lines = raw.split('\n');
  let headerEnd = 0;
  let sawHeader = false;

  for (let index = 0; index < lines.length; index += 1) {
    const trimmed = lines[index].trim();
    if (trimmed.startsWith('To:')) {
      draft.to = trimmed.slice('To:'.length).trim();
      sawHeader = true;
      headerEnd = index + 1;
      continue;
    }
    if (trimmed.startsWith('Subject:')) {
      draft.subject = trimmed.slice('Subject:'.length).trim();
      sawHeader = true;
      headerEnd = index + 1;
      continue;
    }
    if (trimmed === '') {
      if (sawHeader) {
        headerEnd = index + 1;
      }
      continue;
    }
    break;
  }

  draft.body = lines
    .slice(sawHeader ? headerEnd : 0)
    .join('\n')
    .trim();
  return draft;
}

export function buildMailtoUri(to: string, subject: string, body: string): string {
  const params: string[] = [];
  if (subject) {
    params.push(`subject=${encodeURIComponent(subject)}`);
  }
  if (body) {
    params.push(`body=${encodeURIComponent(body)}`);
  }
  const uri = `mailto:${to}`;
  return params.length > 0 ? `${uri}?${params.join('&')}` : uri;
}

/**
 * Meeting prep built on hybrid retrieval: what happened with a person, and
 * which action items are open.
 */

import type { QueryInput } from './query.js';
import type { RankedResult, RetrievalResponse, RetrieveOptions } from './types.js';

/** Anything that can run a retrieval, usually the orchestrator. */
export interface Retriever {
  retrieve(input: QueryInput, options?: RetrieveOptions): Promise<RetrievalResponse>;
}

export interface MeetingSummary {
  date: string | null;
  title: string;
  summary: string;
}

export interface PersonContext {
  person: string;
  /** Distinct documents found for the person */
  meetingCount: number;
  /** Latest document date, if any is dated */
  lastMeeting: string | null;
  recentTopics: string[];
  openActions: string[];
  recentMeetings: MeetingSummary[];
}

export interface ActionItem {
  item: string;
  date: string | null;
  /** Title of the source document */
  source: string;
}

const ACTION_WORDS = ['will', 'to do', 'action', 'next', 'follow'];
const BULLETS = ['-', '•', '*'];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function textOf(result: RankedResult): string {
  return result.content ?? result.snippet ?? '';
}

/**
 * Dedupe results by source file, keeping the first.
 */
function uniqueByFile(results: readonly RankedResult[]): RankedResult[] {
  const seen = new Set<string>();
  const unique: RankedResult[] = [];
  for (const r of results) {
    const key = r.metadata?.filePath ?? r.docRef;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(r);
  }
  return unique;
}

/**
 * Lines following `<person>:` (or `<person> `) in a text, at most `max`.
 */
export function extractPersonActions(text: string, person: string, max = 2): string[] {
  const pattern = new RegExp(`${escapeRegExp(person)}[:\\s]+(.+?)(?:\\n|$)`, 'gi');
  const actions: string[] = [];
  for (const match of text.matchAll(pattern)) {
    if (actions.length >= max) break;
    const action = match[1].trim();
    if (action) actions.push(action);
  }
  return actions;
}

/**
 * Gather context for a 1:1 with `person` from the work vault.
 */
export async function getPersonContext(
  retriever: Retriever,
  person: string,
  options: RetrieveOptions = {},
): Promise<PersonContext> {
  const [tagged, mentioned] = await Promise.all([
    retriever.retrieve(
      { text: person, filters: { vault: 'work', person }, limit: 20, mode: 'hybrid' },
      options,
    ),
    retriever.retrieve(
      { text: `meeting with ${person}`, filters: { vault: 'work' }, limit: 10, mode: 'hybrid' },
      options,
    ),
  ]);

  const unique = uniqueByFile([...tagged.results, ...mentioned.results]);

  const topics: string[] = [];
  const actions: string[] = [];
  const dates: string[] = [];

  for (const r of unique.slice(0, 10)) {
    const date = r.metadata?.date;
    if (date) dates.push(date);

    const text = textOf(r);
    if (text.toLowerCase().includes(person.toLowerCase())) {
      actions.push(...extractPersonActions(text, person));
    }

    const title = r.metadata?.title;
    if (title && !topics.includes(title)) topics.push(title);
  }

  const recentMeetings = unique.slice(0, 5).map(
    (r): MeetingSummary => ({
      date: r.metadata?.date ?? null,
      title: r.metadata?.title ?? '',
      summary: textOf(r).slice(0, 150) + '...',
    }),
  );

  return {
    person,
    meetingCount: unique.length,
    lastMeeting: dates.length > 0 ? dates.reduce((a, b) => (b > a ? b : a)) : null,
    recentTopics: topics.slice(0, 5),
    openActions: actions.slice(0, 5),
    recentMeetings,
  };
}

/**
 * True for a bullet line that reads like an action item.
 *
 * With a person, the line must mention them; otherwise it must contain an
 * action word.
 */
export function isActionLine(line: string, person?: string): boolean {
  if (!BULLETS.some((b) => line.startsWith(b)) || line.length <= 10) return false;
  const lower = line.toLowerCase();
  if (person) return lower.includes(person.toLowerCase());
  return ACTION_WORDS.some((word) => lower.includes(word));
}

/**
 * Collect action items from recent work notes, optionally for one person.
 */
export async function getActionItems(
  retriever: Retriever,
  params: { person?: string; limit?: number } = {},
  options: RetrieveOptions = {},
): Promise<ActionItem[]> {
  const { person, limit = 20 } = params;
  const text = person ? `action items ${person}` : 'action items next steps';

  const response = await retriever.retrieve(
    { text, filters: { vault: 'work' }, limit: 50, mode: 'hybrid' },
    options,
  );

  const seen = new Set<string>();
  const items: ActionItem[] = [];

  for (const r of response.results) {
    for (const rawLine of textOf(r).split('\n')) {
      const line = rawLine.trim();
      if (!isActionLine(line, person)) continue;

      const item = line.replace(/^[-•*\s]+/, '');
      if (seen.has(item)) continue;
      seen.add(item);
      items.push({ item, date: r.metadata?.date ?? null, source: r.metadata?.title ?? '' });
    }
  }

  return items.slice(0, limit);
}

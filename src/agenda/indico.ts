import { z } from "zod";
import { EnrichmentFailure } from "../errors.js";
import { quoteBlock } from "../notes/template.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface IndicoContribution {
  title: string;
  speakers: string[];
  startTime?: string;
  duration?: string;
  description?: string;
}

export interface IndicoAgenda {
  eventId: string;
  title: string;
  description?: string;
  contributions: IndicoContribution[];
  url: string;
}

export interface IndicoUrlMatch {
  url: string;
  host: string;
  eventId: string;
}

// e.g. https://indico.example.org/event/1234/
const INDICO_URL_PATTERN = /https?:\/\/([^/\s]+)\/event\/(\d+)\/?/gi;

export function findIndicoUrls(text: string): IndicoUrlMatch[] {
  if (!text) {
    return [];
  }
  return Array.from(text.matchAll(INDICO_URL_PATTERN), (match) => ({
    url: match[0],
    host: match[1],
    eventId: match[2],
  }));
}

const SpeakerSchema = z.union([
  z.string(),
  z
    .object({
      fullName: z.string().nullish(),
      full_name: z.string().nullish(),
      name: z.string().nullish(),
    })
    .passthrough(),
]);

const ContributionSchema = z
  .object({
    title: z.string().nullish(),
    speakers: z.array(SpeakerSchema).nullish(),
    presenters: z.array(SpeakerSchema).nullish(),
    startDate: z.object({ time: z.string().nullish() }).passthrough().nullish(),
    duration: z.number().nullish(),
    description: z.string().nullish(),
  })
  .passthrough();

const EventExportSchema = z
  .object({
    title: z.string().nullish(),
    description: z.string().nullish(),
    contributions: z.array(z.unknown()).nullish(),
    sessions: z.array(z.object({ contributions: z.array(z.unknown()).nullish() }).passthrough()).nullish(),
  })
  .passthrough();

const ExportResponseSchema = z.object({ results: z.unknown() }).passthrough();

type EventExport = z.infer<typeof EventExportSchema>;

export function parseSpeakers(speakers: unknown[]): string[] {
  const names: string[] = [];
  for (const entry of speakers) {
    const parsed = SpeakerSchema.safeParse(entry);
    if (!parsed.success) continue;
    if (typeof parsed.data === "string") {
      names.push(parsed.data);
      continue;
    }
    const name = parsed.data.fullName || parsed.data.full_name || parsed.data.name;
    if (!name) continue;
    // Indico writes "Last, First"
    const comma = name.indexOf(", ");
    names.push(comma === -1 ? name : `${name.slice(comma + 2)} ${name.slice(0, comma)}`);
  }
  return names;
}

export function formatDuration(minutes: number | null | undefined): string | undefined {
  if (!minutes) {
    return undefined;
  }
  if (minutes >= 60) {
    const hours = Math.floor(minutes / 60);
    const rest = minutes % 60;
    return rest ? `${hours}h ${rest}m` : `${hours}h`;
  }
  return `${minutes}m`;
}

function parseContribution(raw: unknown): IndicoContribution | null {
  const parsed = ContributionSchema.safeParse(raw);
  if (!parsed.success || !parsed.data.title) {
    return null;
  }
  const data = parsed.data;
  const speakerList = data.speakers?.length ? data.speakers : (data.presenters ?? []);

  const contribution: IndicoContribution = {
    title: data.title ?? "",
    speakers: parseSpeakers(speakerList),
  };
  const startTime = data.startDate?.time;
  const duration = formatDuration(data.duration);
  if (startTime) contribution.startTime = startTime;
  if (duration) contribution.duration = duration;
  if (data.description) contribution.description = data.description;
  return contribution;
}

function byStartTime(a: IndicoContribution, b: IndicoContribution): number {
  const left = a.startTime ?? "99:99:99";
  const right = b.startTime ?? "99:99:99";
  return left < right ? -1 : left > right ? 1 : 0;
}

export function parseEventContributions(event: EventExport): IndicoContribution[] {
  const raw: unknown[] = [...(event.contributions ?? [])];
  for (const session of event.sessions ?? []) {
    raw.push(...(session.contributions ?? []));
  }
  return raw
    .map(parseContribution)
    .filter((c): c is IndicoContribution => c !== null)
    .sort(byStartTime);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Walks a timetable export; sessions contribute their nested entries. */
export function parseTimetableContributions(timetable: unknown): IndicoContribution[] {
  const found: IndicoContribution[] = [];

  const walk = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(walk);
      return;
    }
    if (!isRecord(node)) {
      return;
    }

    const entryType = typeof node.entryType === "string" ? node.entryType : "";
    if (entryType === "Session") {
      walk(node.entries);
      return;
    }
    if (entryType === "Contribution") {
      const contribution = parseContribution(node);
      if (contribution) found.push(contribution);
      return;
    }
    Object.values(node).forEach(walk);
  };

  walk(timetable);
  return found.sort(byStartTime);
}

function firstEvent(data: unknown): EventExport | null {
  const response = ExportResponseSchema.safeParse(data);
  if (!response.success || !Array.isArray(response.data.results) || response.data.results.length === 0) {
    return null;
  }
  const event = EventExportSchema.safeParse(response.data.results[0]);
  return event.success ? event.data : null;
}

function timetableFor(data: unknown, eventId: string): unknown {
  const response = ExportResponseSchema.safeParse(data);
  if (!response.success) return null;
  const results = response.data.results;
  if (isRecord(results)) {
    return results[eventId] ?? results;
  }
  if (Array.isArray(results)) {
    return results[0] ?? null;
  }
  return null;
}

export interface IndicoClientOptions {
  apiKey?: string;
  fetch?: FetchLike;
}

export class IndicoClient {
  private apiKey?: string;
  private fetchImpl: FetchLike;

  constructor(options: IndicoClientOptions = {}) {
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private headers(useAuth: boolean): Record<string, string> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (useAuth && this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }

  /** Resolves to the parsed body, or null for non-200 answers, bad JSON or network errors. */
  private async fetchJson(url: string, useAuth: boolean, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: this.headers(useAuth), signal });
    } catch (error) {
      if (signal.aborted) {
        throw new EnrichmentFailure(`Agenda fetch aborted: ${url}`, { cause: error });
      }
      return null;
    }

    if (response.status !== 200) {
      return null;
    }
    try {
      return await response.json();
    } catch {
      return null;
    }
  }

  async fetchAgenda(host: string, eventId: string, signal: AbortSignal): Promise<IndicoAgenda> {
    const baseUrl = `https://${host}`;
    const eventUrl = `${baseUrl}/event/${eventId}/`;
    const exportUrls = [
      `${baseUrl}/export/event/${eventId}.json?detail=contributions`,
      `${baseUrl}/export/event/${eventId}.json?detail=sessions`,
    ];
    const timetableUrl = `${baseUrl}/export/timetable/${eventId}.json`;

    const toAgenda = (event: EventExport, contributions: IndicoContribution[]): IndicoAgenda => {
      const agenda: IndicoAgenda = {
        eventId,
        title: event.title || `Event ${eventId}`,
        contributions,
        url: eventUrl,
      };
      if (event.description) agenda.description = event.description;
      return agenda;
    };

    // Public events answer without credentials; only then retry with the key.
    for (const useAuth of this.apiKey ? [false, true] : [false]) {
      for (const url of exportUrls) {
        const event = firstEvent(await this.fetchJson(url, useAuth, signal));
        if (event) {
          const contributions = parseEventContributions(event);
          if (contributions.length > 0) {
            return toAgenda(event, contributions);
          }
        }
      }

      const timetable = timetableFor(await this.fetchJson(timetableUrl, useAuth, signal), eventId);
      const contributions = parseTimetableContributions(timetable);
      if (contributions.length > 0) {
        return { eventId, title: `Event ${eventId}`, contributions, url: eventUrl };
      }
    }

    const event = firstEvent(
      await this.fetchJson(`${baseUrl}/export/event/${eventId}.json`, Boolean(this.apiKey), signal)
    );
    if (event) {
      return toAgenda(event, []);
    }

    throw new EnrichmentFailure("Could not fetch agenda. Event may require authentication.");
  }
}

export function formatAgendaMarkdown(agenda: IndicoAgenda): string {
  const lines = ["## Agenda", "", `[View on Indico](${agenda.url})`, ""];

  if (agenda.description?.trim()) {
    lines.push(quoteBlock(agenda.description), "");
  }

  if (agenda.contributions.length === 0) {
    lines.push("*No contributions found in this event.*", "");
    return lines.join("\n");
  }

  agenda.contributions.forEach((contribution, index) => {
    lines.push(
      contribution.startTime
        ? `**${contribution.startTime}** - ${contribution.title}`
        : `**${index + 1}.** ${contribution.title}`
    );
    if (contribution.speakers.length > 0) {
      lines.push(`   - *Speakers*: ${contribution.speakers.join(", ")}`);
    }
    if (contribution.duration) {
      lines.push(`   - *Duration*: ${contribution.duration}`);
    }
    lines.push("");
  });

  return lines.join("\n");
}

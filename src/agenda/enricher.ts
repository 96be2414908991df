import type { AgendaConfig } from "../config/index.js";
import { describeError } from "../errors.js";
import { Logger, silentLogger } from "../logging/logger.js";
import {
  FetchLike,
  IndicoAgenda,
  IndicoClient,
  findIndicoUrls,
  formatAgendaMarkdown,
} from "./indico.js";

export type Enrichment =
  | { status: "none" }
  | { status: "skipped"; url: string; reason: string }
  | { status: "ok"; url: string; agenda: IndicoAgenda; markdown: string };

/** Best-effort agenda lookup for an event description. Never rejects. */
export interface AgendaSource {
  enrich(description: string): Promise<Enrichment>;
}

export const noAgenda: AgendaSource = {
  enrich: async () => ({ status: "none" }),
};

export interface AgendaEnricherOptions {
  fetch?: FetchLike;
  logger?: Logger;
}

export class AgendaEnricher implements AgendaSource {
  private config: AgendaConfig;
  private client: IndicoClient;
  private logger: Logger;

  constructor(config: AgendaConfig, options: AgendaEnricherOptions = {}) {
    this.config = config;
    this.client = new IndicoClient({ apiKey: config.apiKey, fetch: options.fetch });
    this.logger = options.logger ?? silentLogger;
  }

  async enrich(description: string): Promise<Enrichment> {
    if (!this.config.enabled) {
      return { status: "none" };
    }

    const [match] = findIndicoUrls(description);
    if (!match) {
      this.logger.debug("No meeting link in event description; agenda skipped");
      return { status: "none" };
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`timed out after ${this.config.timeoutMs}ms`));
      }, this.config.timeoutMs);
    });

    try {
      const agenda = await Promise.race([
        this.client.fetchAgenda(match.host, match.eventId, controller.signal),
        deadline,
      ]);
      return { status: "ok", url: match.url, agenda, markdown: formatAgendaMarkdown(agenda) };
    } catch (error) {
      const reason = describeError(error);
      this.logger.warn(`Agenda for ${match.url} skipped: ${reason}`);
      return { status: "skipped", url: match.url, reason };
    } finally {
      clearTimeout(timer);
    }
  }
}

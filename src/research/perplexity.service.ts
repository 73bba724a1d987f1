import axios from 'axios';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { describeError, isRecord } from '../common/describe-error';

export interface PerplexityCitation {
  url: string;
  title?: string;
  source?: string;
}

export interface ResearchNotes {
  topic: string;
  answer: string;
  citations: PerplexityCitation[];
  /** False when the notes are a placeholder because research was unavailable. */
  live: boolean;
  markdown: string;
}

interface PerplexityResponse {
  choices?: Array<{ message?: { content?: unknown } }>;
  citations?: unknown;
}

const NO_RESEARCH = 'No live research available. Use internal knowledge.';

@Injectable()
export class PerplexityService {
  private readonly model: string;
  private readonly logger = new Logger(PerplexityService.name);

  constructor(private readonly configService: ConfigService) {
    // Use a permitted model; see https://docs.perplexity.ai/getting-started/models
    this.model = this.configService.get<string>('PERPLEXITY_MODEL') ?? 'sonar';
  }

  /** Research never fails a run: without a key or on error the notes say so instead. */
  async research(topic: string): Promise<ResearchNotes> {
    const apiKey = this.configService.get<string>('PERPLEXITY_API_KEY');
    if (!apiKey) {
      this.logger.warn('PERPLEXITY_API_KEY not set; continuing without live research');
      return this.placeholder(topic);
    }
    try {
      const { answer, citations } = await this.search(topic, apiKey);
      if (!answer.trim()) {
        this.logger.warn(`Perplexity returned no summary for "${topic}"`);
        return this.placeholder(topic);
      }
      return { topic, answer, citations, live: true, markdown: renderResearchMarkdown(topic, answer, citations) };
    } catch (error) {
      this.logger.warn(`Research failed (${describeError(error)}), continuing without`);
      return this.placeholder(topic);
    }
  }

  private async search(query: string, apiKey: string): Promise<{ answer: string; citations: PerplexityCitation[] }> {
    const response = await axios.post<PerplexityResponse>(
      'https://api.perplexity.ai/chat/completions',
      {
        model: this.model,
        messages: [
          {
            role: 'system',
            content:
              'You are a news researcher. Return a concise factual briefing with dates, names and figures, and cite your sources.',
          },
          { role: 'user', content: query },
        ],
      },
      {
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
      },
    );

    const content = response.data?.choices?.[0]?.message?.content;
    const answer = typeof content === 'string' ? content : '';
    return { answer, citations: this.parseCitations(response.data?.citations) };
  }

  private placeholder(topic: string): ResearchNotes {
    return { topic, answer: '', citations: [], live: false, markdown: `# Research: ${topic}\n\n${NO_RESEARCH}` };
  }

  private parseCitations(raw: unknown): PerplexityCitation[] {
    if (!Array.isArray(raw)) {
      return [];
    }

    const parsed: PerplexityCitation[] = [];
    const seen = new Set<string>();

    for (const item of raw) {
      if (!item) continue;

      let citation: PerplexityCitation | null = null;
      if (typeof item === 'string') {
        const url = item.trim();
        citation = url ? { url, title: this.humanizeUrl(url) } : null;
      } else if (isRecord(item)) {
        citation = this.normalizeCitationObject(item);
      }
      if (citation && !seen.has(citation.url)) {
        seen.add(citation.url);
        parsed.push(citation);
      }
    }

    return parsed;
  }

  private normalizeCitationObject(candidate: Record<string, unknown>): PerplexityCitation | null {
    const metadata = isRecord(candidate['metadata']) ? candidate['metadata'] : {};
    const url =
      this.safeString(candidate['url']) ||
      this.safeString(candidate['link']) ||
      this.safeString(candidate['href']) ||
      this.safeString(candidate['source']);

    if (!url) {
      return null;
    }

    const title =
      this.safeString(candidate['title']) ||
      this.safeString(candidate['name']) ||
      this.safeString(candidate['snippet']) ||
      this.safeString(metadata['title']);

    const source = this.safeString(candidate['source']) || this.safeString(metadata['source']);

    return {
      url,
      title: title || this.humanizeUrl(url),
      source: source || undefined,
    };
  }

  private safeString(value: unknown): string | null {
    if (typeof value === 'string') {
      const trimmed = value.trim();
      return trimmed.length ? trimmed : null;
    }
    return null;
  }

  private humanizeUrl(raw: string): string {
    try {
      const parsed = new URL(raw);
      return parsed.hostname.replace(/^www\./, '');
    } catch {
      return raw;
    }
  }
}

export function renderResearchMarkdown(topic: string, answer: string, citations: PerplexityCitation[]): string {
  const lines = [`# Research: ${topic}`, '', answer.trim()];
  if (citations.length) {
    lines.push('', '## Sources');
    for (const citation of citations) {
      lines.push(`- ${citation.title ?? citation.url} (${citation.url})`);
    }
  }
  return lines.join('\n');
}

import { Inject, Injectable, Logger } from "@nestjs/common";
import Parser from "rss-parser";
import { SIMULATION_CONFIG } from "../config/simulation.config";
import type { SimulationConfig } from "../config/simulation.config";
import type { NewsItem, NewsSource } from "../types";
import { formatDay } from "../utils/dates";

export const MAX_NEWS_ITEMS = 5;

type NewsApiPayload = {
  status?: string;
  code?: string;
  message?: string;
  articles?: Array<{ title?: string | null; description?: string | null }>;
};

@Injectable()
export class NewsService implements NewsSource {
  private readonly logger = new Logger(NewsService.name);
  private readonly parser = new Parser();

  constructor(@Inject(SIMULATION_CONFIG) private readonly config: SimulationConfig) {}

  async fetchNews(symbol: string, date: Date): Promise<NewsItem[]> {
    const day = formatDay(date);

    const fromApi = await this.fetchFromNewsApi(symbol, day);
    if (fromApi.length > 0) {
      return fromApi;
    }

    const fromFeed = await this.fetchFromFeed(symbol, day);
    if (fromFeed.length > 0) {
      return fromFeed;
    }

    this.logger.log(`[${day}] Using placeholder news for ${symbol}`);
    return [placeholderNews(symbol, day)];
  }

  private async fetchFromNewsApi(symbol: string, day: string): Promise<NewsItem[]> {
    const apiKey = this.config.newsApiKey;
    if (!apiKey) {
      return [];
    }

    const params = new URLSearchParams({
      q: symbol,
      from: day,
      to: day,
      sortBy: "publishedAt",
      apiKey,
    });
    const endpoint = `${this.config.newsApiBaseUrl.replace(/\/$/, "")}/v2/everything?${params.toString()}`;

    try {
      const response = await fetch(endpoint, { method: "GET" });
      const payload = (await response.json()) as NewsApiPayload;
      if (!response.ok || payload.status !== "ok") {
        this.logger.error(
          `[${day}] News API error for ${symbol}: status=${response.status} ${payload.code ?? ""} ${payload.message ?? ""}`.trim(),
        );
        return [];
      }

      const articles = payload.articles ?? [];
      this.logger.log(`[${day}] Fetched ${articles.length} news articles for ${symbol}`);
      return articles.slice(0, MAX_NEWS_ITEMS).map((article) => ({
        title: article.title?.trim() || "No title",
        description: article.description?.trim() || "No description",
      }));
    } catch (error) {
      this.logger.error(`[${day}] Exception fetching news for ${symbol}: ${String(error)}`);
      return [];
    }
  }

  private async fetchFromFeed(symbol: string, day: string): Promise<NewsItem[]> {
    const template = this.config.newsFeedUrl;
    if (!template) {
      return [];
    }

    const feedUrl = template.split("{symbol}").join(encodeURIComponent(symbol));
    try {
      const response = await fetch(feedUrl, { method: "GET" });
      if (!response.ok) {
        this.logger.warn(`[${day}] News feed request failed for ${symbol}: status=${response.status}`);
        return [];
      }
      const parsed = await this.parser.parseString(await response.text());
      const items = (parsed.items ?? [])
        .map((item) => ({
          title: item.title?.trim() ?? "",
          description: (item.contentSnippet ?? item.content ?? "").trim(),
          publishedAt: this.parsePublished(item.isoDate ?? item.pubDate),
        }))
        .filter(
          (item): item is { title: string; description: string; publishedAt: Date } =>
            item.title.length > 0 && item.publishedAt !== null && formatDay(item.publishedAt) === day,
        )
        .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime())
        .slice(0, MAX_NEWS_ITEMS);

      this.logger.log(`[${day}] Fetched ${items.length} feed items for ${symbol}`);
      return items.map((item) => ({
        title: item.title,
        description: item.description || "No description",
      }));
    } catch (error) {
      this.logger.warn(`[${day}] Failed to read news feed for ${symbol}: ${String(error)}`);
      return [];
    }
  }

  private parsePublished(value?: string) {
    if (!value) {
      return null;
    }
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
}

export const placeholderNews = (symbol: string, day: string): NewsItem => ({
  title: `Market update for ${symbol} on ${day}`,
  description: "No API key provided or error occurred in fetching live news.",
});

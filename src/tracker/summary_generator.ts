import { PLATFORMS } from "./types.js";
import type { KeywordSummary, Metrics, Platform } from "./types.js";

function busiestPlatform(metrics: Metrics): Platform | null {
  let busiest: Platform | null = null;
  let most = 0;
  for (const platform of PLATFORMS) {
    const mentions = metrics.platforms[platform]?.mentions ?? 0;
    if (mentions > most) {
      busiest = platform;
      most = mentions;
    }
  }
  return busiest;
}

export function summarize(keyword: string, metrics: Metrics, generatedAt: Date = new Date()): KeywordSummary {
  const topContributors = metrics.topContributors.slice(0, 5).map((contributor) => contributor.author);
  const busiest = busiestPlatform(metrics);

  return {
    keyword,
    generatedAt: generatedAt.toISOString(),
    totalMentions: metrics.totalMentions,
    uniqueAuthors: metrics.uniqueAuthors,
    totalInteractions: metrics.totalInteractions,
    busiestPlatform: busiest,
    topContributors,
    summary: buildCombinedSummary({ keyword, metrics, busiest, topContributors }),
  };
}

interface SummaryInput {
  keyword: string;
  metrics: Metrics;
  busiest: Platform | null;
  topContributors: string[];
}

function buildCombinedSummary({ keyword, metrics, busiest, topContributors }: SummaryInput): string {
  if (metrics.totalMentions === 0) {
    return `No mentions of "${keyword}" were found.`;
  }

  const lines: string[] = [];
  lines.push(
    `"${keyword}" was mentioned ${metrics.totalMentions} times by ${metrics.uniqueAuthors} authors with ${metrics.totalInteractions} interactions.`,
  );

  if (metrics.dateRange) {
    lines.push(`Mentions span ${metrics.dateRange.start.slice(0, 10)} to ${metrics.dateRange.end.slice(0, 10)}.`);
  }

  if (busiest) {
    lines.push(`Most mentions come from ${busiest}.`);
  }

  if (topContributors.length > 0) {
    lines.push(`Top contributors: ${topContributors.join(", ")}.`);
  }

  const highlights = metrics.insights.slice(0, 3);
  if (highlights.length > 0) {
    lines.push("Highlights:");
    highlights.forEach((insight, index) => {
      lines.push(`${index + 1}. ${insight}.`);
    });
  }

  return lines.join(" ");
}

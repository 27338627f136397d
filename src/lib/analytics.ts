/**
 * Conversation metrics for agent performance analysis and analytics reports.
 * Everything here is pure; tools fetch the conversations and deliver the text.
 */

import type { ConversationSummary } from "./vendor/responses.js";

export interface ConversationStats {
  total: number;
  successful: number;
  /** Percentage, 0..100. */
  successRate: number;
  avgDurationSecs: number;
  avgMessages: number;
  /** Status counts in first-seen order. */
  statusCounts: Array<[status: string, count: number]>;
}

export function computeStats(conversations: readonly ConversationSummary[]): ConversationStats {
  const total = conversations.length;
  const successful = conversations.filter((c) => c.call_successful === "success").length;
  const duration = conversations.reduce((sum, c) => sum + (c.call_duration_secs ?? 0), 0);
  const messages = conversations.reduce((sum, c) => sum + (c.message_count ?? 0), 0);

  const counts = new Map<string, number>();
  for (const c of conversations) counts.set(c.status, (counts.get(c.status) ?? 0) + 1);

  return {
    total,
    successful,
    successRate: total > 0 ? (successful / total) * 100 : 0,
    avgDurationSecs: total > 0 ? duration / total : 0,
    avgMessages: total > 0 ? messages / total : 0,
    statusCounts: [...counts.entries()],
  };
}

export function performanceScore(stats: ConversationStats): number {
  const durationScore = Math.min(100, (stats.avgDurationSecs / 300) * 100);
  const messageScore = Math.min(100, (stats.avgMessages / 20) * 100);
  return Math.min(100, stats.successRate * 0.6 + durationScore * 0.2 + messageScore * 0.2);
}

export function recommendations(stats: ConversationStats): string[] {
  const recs: string[] = [];
  if (stats.successRate < 70) {
    recs.push("Consider improving agent configuration or voice quality to reduce call failures");
  } else if (stats.successRate > 90) {
    recs.push("Excellent success rate - your agent configuration is working well");
  }
  if (stats.avgDurationSecs < 60) {
    recs.push("Conversations are quite short - consider if agents are being cut off too early");
  } else if (stats.avgDurationSecs > 900) {
    recs.push("Long conversation durations - consider if this indicates good engagement or inefficient routing");
  }
  if (stats.avgMessages < 5) {
    recs.push("Low message count suggests quick resolutions or potential engagement issues");
  } else if (stats.avgMessages > 50) {
    recs.push("High message count suggests good engagement and thorough conversations");
  }
  if (recs.length === 0) recs.push("Performance metrics look healthy - continue monitoring");
  return recs;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** "in-progress" -> "In-Progress" */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_m, sep: string, ch: string) => sep + ch.toUpperCase());
}

export interface AnalysisPeriod {
  start: Date;
  end: Date;
  daysBack: number;
}

export function analysisPeriod(now: Date, daysBack: number): AnalysisPeriod {
  return { start: new Date(now.getTime() - daysBack * 86_400_000), end: now, daysBack };
}

export function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function formatPerformanceReport(stats: ConversationStats, period: AnalysisPeriod, minConversations: number): string {
  const score = performanceScore(stats);
  const lines = [
    `Agent Performance Analysis (Last ${period.daysBack} days):`,
    "",
    "📊 CONVERSATION METRICS",
    `• Total Conversations: ${stats.total}`,
    `• Successful Calls: ${stats.successful} (${stats.successRate.toFixed(1)}%)`,
    `• Average Duration: ${stats.avgDurationSecs.toFixed(1)} seconds (${(stats.avgDurationSecs / 60).toFixed(1)} minutes)`,
    `• Average Messages per Conversation: ${stats.avgMessages.toFixed(1)}`,
    "",
    "📈 STATUS BREAKDOWN",
    ...stats.statusCounts.map(([status, count]) => `• ${titleCase(status)}: ${count} (${((count / stats.total) * 100).toFixed(1)}%)`),
    "",
    `🎯 PERFORMANCE SCORE: ${score.toFixed(1)}/100`,
    "",
    "💡 INSIGHTS & RECOMMENDATIONS",
    ...recommendations(stats).map((r) => `• ${r}`),
    "",
    "📋 DETAILED STATISTICS",
    `• Analysis Period: ${formatDate(period.start)} to ${formatDate(period.end)}`,
    `• Conversations Analyzed: ${stats.total}`,
    `• Minimum Threshold: ${minConversations} conversations`,
    `• Performance Score: ${score.toFixed(1)}/100`,
  ];
  return lines.join("\n");
}

// ═══════════════════════════════════════════════════════════════════════════════
// Multi-agent report
// ═══════════════════════════════════════════════════════════════════════════════

export type ReportFormat = "summary" | "json" | "csv";

export type AgentReportInput =
  | { agentId: string; agentName: string; conversations: readonly ConversationSummary[] }
  | { agentId: string; error: string };

export interface AgentDetail {
  agent_name: string;
  conversations: {
    total: number;
    successful: number;
    success_rate: number;
    avg_duration_seconds: number;
    avg_duration_minutes: number;
    avg_messages: number;
    status_distribution: Record<string, number>;
  };
}

export interface AnalyticsReport {
  report_metadata: {
    generated_at: string;
    analysis_period: { start: string; end: string; days: number };
    agents_analyzed: string[];
    total_agents: number;
  };
  summary: {
    total_conversations: number;
    total_successful_calls: number;
    overall_success_rate: number;
    overall_avg_duration_seconds: number;
    overall_avg_duration_minutes: number;
    overall_avg_messages: number;
    agents_with_data: number;
  };
  agent_details: Record<string, AgentDetail | { error: string }>;
}

/** Agents without conversations in the period are left out of the details. */
export function buildAnalyticsReport(inputs: readonly AgentReportInput[], period: AnalysisPeriod, generatedAt: Date): AnalyticsReport {
  const details: AnalyticsReport["agent_details"] = {};
  let total = 0;
  let successful = 0;
  let duration = 0;
  let messages = 0;

  for (const input of inputs) {
    if ("error" in input) {
      details[input.agentId] = { error: input.error };
      continue;
    }
    if (input.conversations.length === 0) continue;
    const stats = computeStats(input.conversations);
    details[input.agentId] = {
      agent_name: input.agentName,
      conversations: {
        total: stats.total,
        successful: stats.successful,
        success_rate: stats.successRate,
        avg_duration_seconds: stats.avgDurationSecs,
        avg_duration_minutes: stats.avgDurationSecs / 60,
        avg_messages: stats.avgMessages,
        status_distribution: Object.fromEntries(stats.statusCounts),
      },
    };
    total += stats.total;
    successful += stats.successful;
    duration += stats.avgDurationSecs * stats.total;
    messages += stats.avgMessages * stats.total;
  }

  const avgDuration = total > 0 ? duration / total : 0;
  return {
    report_metadata: {
      generated_at: generatedAt.toISOString(),
      analysis_period: { start: period.start.toISOString(), end: period.end.toISOString(), days: period.daysBack },
      agents_analyzed: inputs.map((i) => i.agentId),
      total_agents: inputs.length,
    },
    summary: {
      total_conversations: total,
      total_successful_calls: successful,
      overall_success_rate: total > 0 ? (successful / total) * 100 : 0,
      overall_avg_duration_seconds: avgDuration,
      overall_avg_duration_minutes: avgDuration / 60,
      overall_avg_messages: total > 0 ? messages / total : 0,
      agents_with_data: Object.keys(details).length,
    },
    agent_details: details,
  };
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export const CSV_HEADER = [
  "Agent ID",
  "Agent Name",
  "Total Conversations",
  "Successful Calls",
  "Success Rate (%)",
  "Avg Duration (min)",
  "Avg Messages",
];

export function renderAnalyticsReport(
  report: AnalyticsReport,
  format: ReportFormat,
  period: AnalysisPeriod,
  generatedAt: Date,
): { text: string; ext: "txt" | "json" | "csv" } {
  if (format === "json") {
    return { text: JSON.stringify(report, null, 2), ext: "json" };
  }

  const entries = Object.entries(report.agent_details);

  if (format === "csv") {
    const rows = [CSV_HEADER.map(csvField).join(",")];
    for (const [agentId, detail] of entries) {
      if ("error" in detail) continue;
      const c = detail.conversations;
      rows.push(
        [agentId, detail.agent_name, c.total, c.successful, c.success_rate.toFixed(1), c.avg_duration_minutes.toFixed(1), c.avg_messages.toFixed(1)]
          .map(csvField)
          .join(","),
      );
    }
    return { text: rows.map((r) => `${r}\r\n`).join(""), ext: "csv" };
  }

  const s = report.summary;
  const lines = [
    "📊 CONVERSATION ANALYTICS REPORT",
    `Generated: ${formatDateTime(generatedAt)}`,
    `Period: ${formatDate(period.start)} to ${formatDate(period.end)} (${period.daysBack} days)`,
    "",
    "🎯 OVERALL SUMMARY",
    `• Total Conversations: ${s.total_conversations.toLocaleString("en-US")}`,
    `• Successful Calls: ${s.total_successful_calls.toLocaleString("en-US")} (${s.overall_success_rate.toFixed(1)}%)`,
    `• Average Duration: ${s.overall_avg_duration_seconds.toFixed(1)}s (${s.overall_avg_duration_minutes.toFixed(1)} min)`,
    `• Average Messages: ${s.overall_avg_messages.toFixed(1)}`,
    `• Agents Analyzed: ${s.agents_with_data}`,
    "",
    "📋 AGENT BREAKDOWN",
  ];
  for (const [agentId, detail] of entries) {
    if ("error" in detail) {
      lines.push(`• ${agentId}: Error - ${detail.error}`, "");
      continue;
    }
    const c = detail.conversations;
    lines.push(
      `• ${detail.agent_name} (${agentId})`,
      `  - Conversations: ${c.total} (Success: ${c.successful}, ${c.success_rate.toFixed(1)}%)`,
      `  - Avg Duration: ${c.avg_duration_minutes.toFixed(1)} min, Messages: ${c.avg_messages.toFixed(1)}`,
      "",
    );
  }
  return { text: lines.join("\n"), ext: "txt" };
}

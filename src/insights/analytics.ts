import type { Priority, Task, TaskStatus } from '../model.js';
import { weekStartOf } from '../dates.js';
import { countBy, mean, mostCommon, toRecord } from './stats.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const WEEKDAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export type PriorityBalance = 'well_balanced' | 'moderately_balanced' | 'unbalanced';

export interface TagCount {
  tag: string;
  count: number;
}

export interface BasicStats {
  total_tasks: number;
  avg_title_length: number;
  avg_description_length: number;
  tasks_with_descriptions: number;
  tasks_with_tags: number;
  oldest_task_days: number;
  newest_task_days: number;
}

export interface PriorityAnalysis {
  distribution: Partial<Record<Priority, number>>;
  /** 0..100 */
  percentages: Partial<Record<Priority, number>>;
  /** 0..1 */
  high_priority_ratio: number;
  priority_balance: PriorityBalance;
  urgent_tasks: number;
}

export interface StatusAnalysis {
  distribution: Partial<Record<TaskStatus, number>>;
  percentages: Partial<Record<TaskStatus, number>>;
  completion_rate: number;
  pending_tasks: number;
  in_progress_tasks: number;
  completed_tasks: number;
}

export interface TagAnalysis {
  total_unique_tags: number;
  most_common_tags: TagCount[];
  tag_usage_percentage: number;
  most_common_combinations: Array<{ tags: string[]; count: number }>;
  tag_diversity: number;
}

export interface ProductivityMetrics {
  avg_daily_tasks: number;
  max_daily_tasks: number;
  min_daily_tasks: number;
  avg_task_complexity: number;
  total_days_active: number;
  productivity_score: number;
}

export interface TrendAnalysis {
  /** Tasks created per week (Monday start), oldest week first. */
  weekly_task_counts: number[];
  trend_direction: 'increasing' | 'decreasing' | 'stable';
  trend_strength: number;
  most_productive_week: number;
  least_productive_week: number;
  weekly_priority_trends: Record<string, Partial<Record<Priority, number>>>;
}

export interface ComprehensiveStats {
  basic_stats: BasicStats;
  priority_analysis: PriorityAnalysis;
  status_analysis: StatusAnalysis;
  tag_analysis: TagAnalysis;
  productivity_metrics: ProductivityMetrics;
  trends: TrendAnalysis;
  insights: string[];
  recommendations: string[];
}

export interface EmptyStats {
  basic_stats: { total_tasks: 0; message: string };
  priority_analysis: Record<string, never>;
  status_analysis: Record<string, never>;
  tag_analysis: Record<string, never>;
  productivity_metrics: Record<string, never>;
  trends: Record<string, never>;
  insights: string[];
  recommendations: string[];
}

export interface WeeklyReport {
  period: string;
  tasks_created: number;
  tasks_completed: number;
  completion_rate: number;
  most_productive_day: string;
  priority_distribution: Partial<Record<Priority, number>>;
  top_tags: TagCount[];
}

function percentages<K extends string>(counts: Map<K, number>, total: number): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {};
  for (const [k, v] of counts) out[k] = (v / total) * 100;
  return out;
}

function tagCounts(pairs: Array<[string, number]>): TagCount[] {
  return pairs.map(([tag, count]) => ({ tag, count }));
}

function basicStats(tasks: Task[], now: Date): BasicStats {
  const created = tasks.map((t) => Date.parse(t.createdAt)).filter(Number.isFinite);
  const daysSince = (ms: number) => Math.floor((now.getTime() - ms) / DAY_MS);

  return {
    total_tasks: tasks.length,
    avg_title_length: mean(tasks.map((t) => t.title.length)),
    avg_description_length: mean(tasks.map((t) => t.description.length)),
    tasks_with_descriptions: tasks.filter((t) => t.description).length,
    tasks_with_tags: tasks.filter((t) => t.tags.length > 0).length,
    oldest_task_days: created.length ? daysSince(Math.min(...created)) : 0,
    newest_task_days: created.length ? daysSince(Math.max(...created)) : 0,
  };
}

/** Normalized entropy of the priority mix. */
export function priorityBalance(counts: Map<Priority, number>): PriorityBalance {
  const total = [...counts.values()].reduce((a, b) => a + b, 0);
  if (total === 0) return 'well_balanced';

  const entropy = -[...counts.values()]
    .map((c) => c / total)
    .filter((p) => p > 0)
    .reduce((sum, p) => sum + p * Math.log2(p), 0);
  const maxEntropy = Math.log2(counts.size);
  const ratio = maxEntropy > 0 ? entropy / maxEntropy : 0;

  if (ratio > 0.8) return 'well_balanced';
  if (ratio > 0.5) return 'moderately_balanced';
  return 'unbalanced';
}

function priorityAnalysis(tasks: Task[]): PriorityAnalysis {
  const counts = countBy(tasks.map((t) => t.priority));
  const high = counts.get('high') ?? 0;
  return {
    distribution: toRecord(counts),
    percentages: percentages(counts, tasks.length),
    high_priority_ratio: high / tasks.length,
    priority_balance: priorityBalance(counts),
    urgent_tasks: high,
  };
}

const statusOf = (t: Task): TaskStatus => (t.completed ? 'completed' : t.status);

function statusAnalysis(tasks: Task[]): StatusAnalysis {
  const counts = countBy(tasks.map(statusOf));
  const completed = counts.get('completed') ?? 0;
  return {
    distribution: toRecord(counts),
    percentages: percentages(counts, tasks.length),
    completion_rate: (completed / tasks.length) * 100,
    pending_tasks: counts.get('pending') ?? 0,
    in_progress_tasks: counts.get('in_progress') ?? 0,
    completed_tasks: completed,
  };
}

function tagAnalysis(tasks: Task[]): TagAnalysis {
  const counts = countBy(tasks.flatMap((t) => t.tags));
  const combos = mostCommon(
    tasks.filter((t) => t.tags.length > 1).map((t) => [...t.tags].sort().join('\u0000')),
    3,
  );

  return {
    total_unique_tags: counts.size,
    most_common_tags: tagCounts(mostCommon(tasks.flatMap((t) => t.tags), 5)),
    tag_usage_percentage: (tasks.filter((t) => t.tags.length > 0).length / tasks.length) * 100,
    most_common_combinations: combos.map(([key, count]) => ({ tags: key.split('\u0000'), count })),
    tag_diversity: counts.size / tasks.length,
  };
}

/** Completion 50%, low high-priority share 30%, tag usage 20%; 0..100. */
function overallScore(status: StatusAnalysis, priority: PriorityAnalysis, tags: TagAnalysis): number {
  const score =
    status.completion_rate * 0.5 + 100 * (1 - priority.high_priority_ratio) * 0.3 + tags.tag_usage_percentage * 0.2;
  return Math.min(100, Math.max(0, score));
}

function complexityOf(task: Task): number {
  let score = task.description.length / 100;
  score += task.tags.length * 0.5;
  if (task.priority === 'high') score += 1;
  return score;
}

function productivityMetrics(tasks: Task[], score: number): ProductivityMetrics {
  const perDay = [...countBy(tasks.map((t) => t.createdAt.slice(0, 10))).values()];
  return {
    avg_daily_tasks: mean(perDay),
    max_daily_tasks: perDay.length ? Math.max(...perDay) : 0,
    min_daily_tasks: perDay.length ? Math.min(...perDay) : 0,
    avg_task_complexity: mean(tasks.map(complexityOf)),
    total_days_active: perDay.length,
    productivity_score: score,
  };
}

function trendAnalysis(tasks: Task[]): TrendAnalysis {
  const byWeek = new Map<string, Task[]>();
  for (const t of tasks) {
    const week = weekStartOf(t.createdAt);
    byWeek.set(week, [...(byWeek.get(week) ?? []), t]);
  }

  const weeks = [...byWeek.keys()].sort();
  const counts = weeks.map((w) => byWeek.get(w)?.length ?? 0);
  const weeklyPriorities: TrendAnalysis['weekly_priority_trends'] = {};
  for (const w of weeks) weeklyPriorities[w] = toRecord(countBy((byWeek.get(w) ?? []).map((t) => t.priority)));

  const first = counts[0] ?? 0;
  const last = counts[counts.length - 1] ?? 0;
  let direction: TrendAnalysis['trend_direction'] = 'stable';
  let strength = 0;
  if (counts.length > 1 && last !== first) {
    direction = last > first ? 'increasing' : 'decreasing';
    strength = Math.abs(last - first) / Math.max(...counts);
  }

  return {
    weekly_task_counts: counts,
    trend_direction: direction,
    trend_strength: strength,
    most_productive_week: counts.length ? Math.max(...counts) : 0,
    least_productive_week: counts.length ? Math.min(...counts) : 0,
    weekly_priority_trends: weeklyPriorities,
  };
}

function insightsOf(
  priority: PriorityAnalysis,
  status: StatusAnalysis,
  tags: TagAnalysis,
  metrics: ProductivityMetrics,
  trends: TrendAnalysis,
): string[] {
  const out: string[] = [];

  if (priority.high_priority_ratio > 0.3) {
    out.push(
      `${(priority.high_priority_ratio * 100).toFixed(1)}% of your tasks are high priority - consider delegating or breaking them down`,
    );
  } else if (priority.high_priority_ratio < 0.1) {
    out.push('Your priority distribution looks balanced');
  }

  if (status.completion_rate < 20) out.push('Low completion rate - try focusing on smaller, achievable tasks');
  else if (status.completion_rate > 80) out.push('Excellent completion rate! Keep up the great work');

  if (tags.tag_usage_percentage < 50) out.push('Consider using more tags to better organize your tasks');

  if (metrics.avg_daily_tasks > 10) out.push('High daily task volume - consider batching similar tasks');

  if (trends.trend_direction === 'increasing') out.push('Task volume is increasing - monitor your workload');
  else if (trends.trend_direction === 'decreasing') {
    out.push('Task volume is decreasing - good progress on clearing your backlog');
  }

  return out;
}

function recommendationsOf(
  priority: PriorityAnalysis,
  status: StatusAnalysis,
  tags: TagAnalysis,
  metrics: ProductivityMetrics,
): string[] {
  const out: string[] = [];
  if (priority.urgent_tasks > 5) {
    out.push('You have many high-priority tasks. Try the Eisenhower Matrix to prioritize effectively');
  }
  if (status.pending_tasks > 10) {
    out.push('Many pending tasks - consider time-blocking to tackle them systematically');
  }
  if (tags.total_unique_tags < 5) {
    out.push('Create a tagging system (e.g., work, personal, urgent, learning) for better organization');
  }
  if (metrics.avg_task_complexity > 2) {
    out.push('Complex tasks detected - break them into smaller, manageable subtasks');
  }
  return out;
}

export function emptyStats(): EmptyStats {
  return {
    basic_stats: { total_tasks: 0, message: 'No tasks found' },
    priority_analysis: {},
    status_analysis: {},
    tag_analysis: {},
    productivity_metrics: {},
    trends: {},
    insights: ['No tasks available for analysis'],
    recommendations: ['Add some tasks to get started!'],
  };
}

export function isEmptyStats(stats: ComprehensiveStats | EmptyStats): stats is EmptyStats {
  return stats.basic_stats.total_tasks === 0;
}

export function comprehensiveStats(tasks: Task[], now: Date = new Date()): ComprehensiveStats | EmptyStats {
  if (tasks.length === 0) return emptyStats();

  const priority = priorityAnalysis(tasks);
  const status = statusAnalysis(tasks);
  const tags = tagAnalysis(tasks);
  const metrics = productivityMetrics(tasks, overallScore(status, priority, tags));
  const trends = trendAnalysis(tasks);

  return {
    basic_stats: basicStats(tasks, now),
    priority_analysis: priority,
    status_analysis: status,
    tag_analysis: tags,
    productivity_metrics: metrics,
    trends,
    insights: insightsOf(priority, status, tags, metrics, trends),
    recommendations: recommendationsOf(priority, status, tags, metrics),
  };
}

/** Activity over the 7 days before `now`. */
export function weeklyReport(tasks: Task[], now: Date = new Date()): WeeklyReport {
  const since = now.getTime() - 7 * DAY_MS;
  const recent = tasks.filter((t) => Date.parse(t.createdAt) >= since);
  const completed = recent.filter((t) => t.completed).length;

  const [busiest] = mostCommon(recent.map((t) => WEEKDAY_NAMES[new Date(t.createdAt).getUTCDay()] ?? 'Unknown'), 1);

  return {
    period: 'Last 7 days',
    tasks_created: recent.length,
    tasks_completed: completed,
    completion_rate: recent.length ? (completed / recent.length) * 100 : 0,
    most_productive_day: busiest ? busiest[0] : 'No tasks',
    priority_distribution: toRecord(countBy(recent.map((t) => t.priority))),
    top_tags: tagCounts(mostCommon(recent.flatMap((t) => t.tags), 3)),
  };
}

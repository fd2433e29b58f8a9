import type { Priority, Task } from '../model.js';
import { isOverdue } from '../dates.js';
import { countBy, mean, mostCommon, percent, round1 } from './stats.js';

export type SuggestionType =
  | 'onboarding'
  | 'productivity_boost'
  | 'priority_optimization'
  | 'time_management'
  | 'workflow_improvement';

export interface TaskSuggestion {
  title: string;
  description: string;
  priority: Priority;
  tags: string[];
  /** 0..1 */
  confidence: number;
  reasoning: string;
  suggestion_type: SuggestionType;
}

export type PatternType =
  | 'burst_creation'
  | 'high_priority_heavy'
  | 'low_priority_heavy'
  | 'low_completion_rate'
  | 'slow_completion'
  | 'low_tag_usage'
  | 'high_tag_diversity'
  | 'frequent_overdue';

export interface BehaviorPattern {
  type: PatternType;
  description: string;
  confidence: number;
  data_points: number;
  recommendations: string[];
}

export interface ProductivityScore {
  score: number;
  level: 'Beginner' | 'Intermediate' | 'Advanced' | 'Expert';
  completion_rate: number;
  priority_balance: number;
  tag_usage: number;
  due_date_adherence: number;
  message: string;
}

export interface NextAction {
  action: string;
  priority: Priority;
  reasoning: string;
}

const HOUR_MS = 60 * 60 * 1000;

const ONBOARDING: TaskSuggestion[] = [
  {
    title: 'Create your first task',
    description: 'Start by adding a simple task to get familiar with the system',
    priority: 'medium',
    tags: ['getting-started'],
    confidence: 0.95,
    reasoning: 'New user detected - need to create first task',
    suggestion_type: 'onboarding',
  },
  {
    title: 'Set up your workspace',
    description: "Organize your tasks with tags like 'work', 'personal', 'urgent'",
    priority: 'medium',
    tags: ['organization', 'setup'],
    confidence: 0.9,
    reasoning: 'Help user establish good organizational habits',
    suggestion_type: 'onboarding',
  },
  {
    title: 'Add a high-priority task',
    description: 'Practice setting priorities to manage your workload effectively',
    priority: 'high',
    tags: ['priority', 'practice'],
    confidence: 0.85,
    reasoning: 'Teach priority management early',
    suggestion_type: 'onboarding',
  },
];

const isOpen = (t: Task) => !t.completed;
const isQuickWin = (t: Task) => isOpen(t) && t.priority === 'low' && t.description.length < 50;

// --- behavior patterns ---

function creationPattern(tasks: Task[]): BehaviorPattern | undefined {
  if (tasks.length < 3) return undefined;

  const perDay = [...countBy(tasks.map((t) => t.createdAt.slice(0, 10))).values()];
  const maxDaily = Math.max(...perDay);
  if (maxDaily <= mean(perDay) * 2) return undefined;

  return {
    type: 'burst_creation',
    description: `You tend to create tasks in bursts (up to ${maxDaily} per day)`,
    confidence: 0.8,
    data_points: perDay.length,
    recommendations: [
      'Consider spreading task creation throughout the day',
      'Use task templates for common activities',
      'Batch planning sessions for better organization',
    ],
  };
}

function priorityPattern(tasks: Task[]): BehaviorPattern | undefined {
  const total = tasks.length;
  if (total < 5) return undefined;

  const counts = countBy(tasks.map((t) => t.priority));
  const highRatio = (counts.get('high') ?? 0) / total;
  const lowRatio = (counts.get('low') ?? 0) / total;

  if (highRatio > 0.6) {
    return {
      type: 'high_priority_heavy',
      description: `You mark ${percent(highRatio)} of tasks as high priority`,
      confidence: 0.85,
      data_points: total,
      recommendations: [
        'Consider if all tasks truly need high priority',
        'Use medium priority for important but not urgent tasks',
        'Review priority criteria to avoid priority inflation',
      ],
    };
  }
  if (lowRatio > 0.7) {
    return {
      type: 'low_priority_heavy',
      description: `You mark ${percent(lowRatio)} of tasks as low priority`,
      confidence: 0.85,
      data_points: total,
      recommendations: [
        'Review if some tasks could be higher priority',
        'Consider delegating or removing very low priority tasks',
        'Focus on medium priority tasks for better balance',
      ],
    };
  }
  return undefined;
}

function completionPattern(tasks: Task[]): BehaviorPattern | undefined {
  const done = tasks.filter((t) => t.completed);
  if (done.length === 0 || done.length === tasks.length) return undefined;

  const rate = done.length / tasks.length;
  const hours = done.map((t) => (Date.parse(t.completedAt ?? t.updatedAt) - Date.parse(t.createdAt)) / HOUR_MS);
  const avgHours = mean(hours);

  if (rate < 0.3) {
    return {
      type: 'low_completion_rate',
      description: `Your task completion rate is ${percent(rate)}`,
      confidence: 0.9,
      data_points: tasks.length,
      recommendations: [
        'Break down large tasks into smaller subtasks',
        'Set realistic deadlines for better motivation',
        'Focus on completing 1-3 tasks per day',
        'Review and remove tasks that are no longer relevant',
      ],
    };
  }
  if (avgHours > 72) {
    return {
      type: 'slow_completion',
      description: `Tasks take an average of ${avgHours.toFixed(1)} hours to complete`,
      confidence: 0.8,
      data_points: hours.length,
      recommendations: [
        'Set shorter time blocks for task completion',
        'Use time tracking to identify bottlenecks',
        'Consider if tasks are too complex',
        'Implement the 2-minute rule for quick tasks',
      ],
    };
  }
  return undefined;
}

function tagPattern(tasks: Task[]): BehaviorPattern | undefined {
  const tagged = tasks.filter((t) => t.tags.length > 0);
  if (tagged.length < 3) return undefined;

  const usage = tagged.length / tasks.length;
  if (usage < 0.3) {
    return {
      type: 'low_tag_usage',
      description: `Only ${percent(usage)} of tasks have tags`,
      confidence: 0.75,
      data_points: tasks.length,
      recommendations: [
        'Use tags to categorize tasks by project or context',
        'Create consistent tag naming conventions',
        'Tag tasks to improve search and filtering',
        'Use tags for better task organization',
      ],
    };
  }

  const unique = new Set(tagged.flatMap((t) => t.tags)).size;
  if (unique > 20) {
    return {
      type: 'high_tag_diversity',
      description: `You use ${unique} different tags`,
      confidence: 0.7,
      data_points: tagged.length,
      recommendations: [
        'Consider consolidating similar tags',
        'Create a tag hierarchy for better organization',
        'Review and remove unused tags',
        'Standardize tag naming conventions',
      ],
    };
  }
  return undefined;
}

function overduePattern(tasks: Task[], now: Date): BehaviorPattern | undefined {
  const dated = tasks.filter((t) => t.dueDate);
  if (dated.length < 3) return undefined;

  const rate = dated.filter((t) => isOverdue(t, now)).length / dated.length;
  if (rate <= 0.3) return undefined;

  return {
    type: 'frequent_overdue',
    description: `${percent(rate)} of tasks with due dates are overdue`,
    confidence: 0.85,
    data_points: dated.length,
    recommendations: [
      'Set more realistic due dates',
      'Add buffer time to your estimates',
      'Review and adjust deadlines regularly',
      'Consider using time estimates instead of just due dates',
    ],
  };
}

/** Behavior patterns found in a task list (empty when nothing stands out). */
export function analyzeBehavior(tasks: Task[], now: Date = new Date()): BehaviorPattern[] {
  if (tasks.length === 0) return [];
  return [
    creationPattern(tasks),
    priorityPattern(tasks),
    completionPattern(tasks),
    tagPattern(tasks),
    overduePattern(tasks, now),
  ].filter((p): p is BehaviorPattern => p !== undefined);
}

// --- suggestion generators ---

function contextualSuggestions(patterns: BehaviorPattern[]): TaskSuggestion[] {
  const out: TaskSuggestion[] = [];
  for (const p of patterns) {
    if (p.type === 'low_completion_rate') {
      out.push({
        title: 'Create a daily focus list',
        description: 'Select 3 most important tasks for today and focus on completing them',
        priority: 'high',
        tags: ['productivity', 'focus'],
        confidence: 0.9,
        reasoning: 'Low completion rate detected - need to improve focus',
        suggestion_type: 'productivity_boost',
      });
    } else if (p.type === 'high_priority_heavy') {
      out.push({
        title: 'Review and reprioritize tasks',
        description: 'Go through your high-priority tasks and identify which can be medium priority',
        priority: 'medium',
        tags: ['organization', 'priority'],
        confidence: 0.85,
        reasoning: 'Too many high-priority tasks detected',
        suggestion_type: 'priority_optimization',
      });
    } else if (p.type === 'frequent_overdue') {
      out.push({
        title: 'Set up a weekly planning session',
        description: 'Dedicate 30 minutes each week to review and adjust task deadlines',
        priority: 'medium',
        tags: ['planning', 'time-management'],
        confidence: 0.8,
        reasoning: 'Frequent overdue tasks detected',
        suggestion_type: 'time_management',
      });
    }
  }
  return out;
}

function completionSuggestions(tasks: Task[], now: Date): TaskSuggestion[] {
  const out: TaskSuggestion[] = [];

  const quickWins = tasks.filter(isQuickWin);
  if (quickWins.length > 0) {
    out.push({
      title: `Complete ${Math.min(3, quickWins.length)} quick tasks`,
      description: 'Focus on simple, low-priority tasks to build momentum',
      priority: 'low',
      tags: ['momentum', 'quick-wins'],
      confidence: 0.8,
      reasoning: `Found ${quickWins.length} potential quick wins`,
      suggestion_type: 'productivity_boost',
    });
  }

  const overdue = tasks.filter((t) => isOverdue(t, now));
  if (overdue.length > 0) {
    out.push({
      title: `Address ${overdue.length} overdue tasks`,
      description: 'Review and either complete, reschedule, or remove overdue tasks',
      priority: 'high',
      tags: ['overdue', 'cleanup'],
      confidence: 0.9,
      reasoning: `Found ${overdue.length} overdue tasks`,
      suggestion_type: 'priority_optimization',
    });
  }
  return out;
}

function optimizationSuggestions(tasks: Task[]): TaskSuggestion[] {
  const out: TaskSuggestion[] = [];

  const complex = tasks.filter((t) => t.description.length > 100);
  if (complex.length > 0) {
    out.push({
      title: 'Break down complex tasks',
      description: 'Split large tasks into smaller, manageable subtasks',
      priority: 'medium',
      tags: ['optimization', 'complexity'],
      confidence: 0.75,
      reasoning: `Found ${complex.length} complex tasks that could be simplified`,
      suggestion_type: 'workflow_improvement',
    });
  }

  const [top] = mostCommon(tasks.flatMap((t) => t.tags), 1);
  if (top) {
    const [tag, count] = top;
    out.push({
      title: `Focus on ${tag} tasks`,
      description: `You have ${count} tasks tagged with '${tag}' - consider batching them`,
      priority: 'medium',
      tags: ['batching', 'focus'],
      confidence: 0.7,
      reasoning: `Most common tag: ${tag} with ${count} tasks`,
      suggestion_type: 'productivity_boost',
    });
  }
  return out;
}

function proactiveSuggestions(tasks: Task[]): TaskSuggestion[] {
  const out: TaskSuggestion[] = [];

  const words = tasks.flatMap((t) => t.title.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? []);
  const recurring = mostCommon(words, 10).find(([word, count]) => count > 2 && word.length > 3);
  if (recurring) {
    const [activity, count] = recurring;
    out.push({
      title: `Create template for ${activity} tasks`,
      description: `Since you frequently create tasks involving '${activity}', consider creating a template`,
      priority: 'low',
      tags: ['template', 'efficiency'],
      confidence: 0.6,
      reasoning: `'${activity}' appears in ${count} task titles`,
      suggestion_type: 'workflow_improvement',
    });
  }

  const highOpen = tasks.filter((t) => isOpen(t) && t.priority === 'high');
  if (highOpen.length > 3) {
    out.push({
      title: 'Schedule focused time blocks',
      description: 'Block 2-3 hours for your high-priority tasks to ensure completion',
      priority: 'high',
      tags: ['time-blocking', 'focus'],
      confidence: 0.8,
      reasoning: `You have ${highOpen.length} high-priority pending tasks`,
      suggestion_type: 'time_management',
    });
  }
  return out;
}

/**
 * Ranked recommendations for a user's task list. New users (no tasks) get
 * onboarding suggestions.
 */
export function smartSuggestions(tasks: Task[], now: Date = new Date(), limit = 5): TaskSuggestion[] {
  if (tasks.length === 0) return ONBOARDING.slice(0, limit).map((s) => ({ ...s, tags: [...s.tags] }));

  const patterns = analyzeBehavior(tasks, now);
  const all = [
    ...contextualSuggestions(patterns),
    ...completionSuggestions(tasks, now),
    ...optimizationSuggestions(tasks),
    ...proactiveSuggestions(tasks),
  ];

  // stable: equal confidence keeps generation order
  all.sort((a, b) => b.confidence - a.confidence);
  return all.slice(0, limit);
}

function levelOf(score: number): ProductivityScore['level'] {
  if (score >= 80) return 'Expert';
  if (score >= 60) return 'Advanced';
  if (score >= 40) return 'Intermediate';
  return 'Beginner';
}

/**
 * Weighted score: completion 40%, priority balance 20% (ideal is 30% high
 * priority), tag usage 20%, due-date adherence 20%.
 */
export function productivityScore(tasks: Task[], now: Date = new Date()): ProductivityScore {
  if (tasks.length === 0) {
    return {
      score: 0,
      level: 'Beginner',
      completion_rate: 0,
      priority_balance: 0,
      tag_usage: 0,
      due_date_adherence: 0,
      message: 'No tasks to analyze',
    };
  }

  const total = tasks.length;
  const completionRate = tasks.filter((t) => t.completed).length / total;
  const highShare = tasks.filter((t) => t.priority === 'high').length / total;
  const priorityBalance = 1 - Math.abs(highShare - 0.3);
  const tagUsage = tasks.filter((t) => t.tags.length > 0).length / total;

  const dated = tasks.filter((t) => t.dueDate);
  // neutral when nothing has a due date
  const adherence = dated.length > 0 ? 1 - dated.filter((t) => isOverdue(t, now)).length / dated.length : 0.5;

  const score = (completionRate * 0.4 + priorityBalance * 0.2 + tagUsage * 0.2 + adherence * 0.2) * 100;
  const level = levelOf(score);

  return {
    score: round1(score),
    level,
    completion_rate: round1(completionRate * 100),
    priority_balance: round1(priorityBalance * 100),
    tag_usage: round1(tagUsage * 100),
    due_date_adherence: round1(adherence * 100),
    message: `You're at ${level} level with ${score.toFixed(1)}% productivity score`,
  };
}

export function nextActions(tasks: Task[], now: Date = new Date(), limit = 3): NextAction[] {
  if (tasks.length === 0) {
    return [{ action: 'Create your first task', priority: 'high', reasoning: 'Get started with task management' }];
  }

  const actions: NextAction[] = [];

  const overdue = tasks.filter((t) => isOverdue(t, now));
  if (overdue.length > 0) {
    actions.push({
      action: `Address ${overdue.length} overdue task(s)`,
      priority: 'high',
      reasoning: 'Overdue tasks can create stress and reduce productivity',
    });
  }

  const highOpen = tasks.filter((t) => isOpen(t) && t.priority === 'high');
  if (highOpen.length > 0) {
    actions.push({
      action: `Focus on ${highOpen.length} high-priority task(s)`,
      priority: 'high',
      reasoning: 'High-priority tasks should be completed first',
    });
  }

  const quickWins = tasks.filter(isQuickWin);
  if (quickWins.length > 0) {
    actions.push({
      action: `Complete ${Math.min(3, quickWins.length)} quick task(s)`,
      priority: 'medium',
      reasoning: 'Quick wins build momentum and motivation',
    });
  }

  if (tasks.filter(isOpen).length > 10) {
    actions.push({
      action: 'Review and prioritize your task list',
      priority: 'medium',
      reasoning: 'Large number of pending tasks - need organization',
    });
  }

  return actions.slice(0, limit);
}


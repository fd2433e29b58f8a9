export const PRIORITIES = ['low', 'medium', 'high'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const TASK_STATUSES = ['pending', 'in_progress', 'completed'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export type DueStatus = 'completed' | 'overdue' | 'today' | 'soon' | 'upcoming' | 'no_due_date';

export interface Task {
  /** Stable id we assign (uuid). */
  id: string;
  ownerId: string;
  title: string;
  description: string;
  priority: Priority;
  status: TaskStatus;
  /** Always equal to `status === 'completed'`. */
  completed: boolean;
  /** Lower-cased, de-duplicated. */
  tags: string[];
  /** Calendar date, YYYY-MM-DD. */
  dueDate?: string;
  createdAt: string; // ISO
  updatedAt: string; // ISO
  completedAt?: string; // ISO
}

export type AuthProvider = 'local' | 'google';

export interface User {
  id: string;
  username: string;
  email: string;
  /** bcrypt hash; absent for accounts created through Google sign-in. */
  passwordHash?: string;
  /** OpenID `sub` claim of the linked Google account. */
  googleSubject?: string;
  createdAt: string;
  lastLoginAt?: string;
  active: boolean;
}

export interface Session {
  token: string;
  userId: string;
  createdAt: string;
  expiresAt: string;
}

export interface TaskView {
  id: string;
  title: string;
  description: string;
  priority: Priority;
  status: TaskStatus;
  completed: boolean;
  tags: string[];
  due_date: string | null;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
  due_status: DueStatus;
  similarity_score?: number;
}

export interface UserView {
  id: string;
  username: string;
  email: string;
  created_at: string;
  last_login_at: string | null;
  auth_provider: AuthProvider;
}

export function toUserView(user: User): UserView {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    created_at: user.createdAt,
    last_login_at: user.lastLoginAt ?? null,
    auth_provider: user.passwordHash ? 'local' : 'google',
  };
}

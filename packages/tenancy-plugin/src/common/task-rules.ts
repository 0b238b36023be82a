import { TaskStatus } from '../entities/task.enums';

const CLOSED_STATUSES: readonly TaskStatus[] = [TaskStatus.COMPLETED, TaskStatus.CANCELLED];

export const OPEN_TASK_STATUSES: readonly TaskStatus[] = [TaskStatus.TODO, TaskStatus.IN_PROGRESS, TaskStatus.IN_REVIEW];

export function isTaskOverdue(task: { status: TaskStatus; dueDate: Date | null }, now: Date): boolean {
    if (!task.dueDate || CLOSED_STATUSES.includes(task.status)) {
        return false;
    }
    return task.dueDate.getTime() < now.getTime();
}

/**
 * Percentage of completed subtasks, rounded down. A task without subtasks
 * is either 0 or 100 depending on its own status.
 */
export function getTaskProgress(status: TaskStatus, subtaskStatuses: readonly TaskStatus[]): number {
    if (subtaskStatuses.length === 0) {
        return status === TaskStatus.COMPLETED ? 100 : 0;
    }
    const completed = subtaskStatuses.filter(s => s === TaskStatus.COMPLETED).length;
    return Math.floor((completed / subtaskStatuses.length) * 100);
}

/**
 * `completedAt` after a status change: stamped on entering COMPLETED,
 * cleared on leaving it, kept otherwise.
 */
export function getCompletedAt(
    from: TaskStatus,
    to: TaskStatus,
    completedAt: Date | null,
    now: Date,
): Date | null {
    if (to !== TaskStatus.COMPLETED) {
        return null;
    }
    return from === TaskStatus.COMPLETED ? completedAt : now;
}

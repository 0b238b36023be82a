import { describe, expect, it } from 'vitest';

import { TaskStatus } from '../entities/task.enums';

import { getCompletedAt, getTaskProgress, isTaskOverdue } from './task-rules';

const now = new Date('2024-03-01T12:00:00.000Z');
const yesterday = new Date('2024-02-29T12:00:00.000Z');
const tomorrow = new Date('2024-03-02T12:00:00.000Z');

describe('isTaskOverdue()', () => {
    it('is overdue when an open task is past its due date', () => {
        expect(isTaskOverdue({ status: TaskStatus.IN_PROGRESS, dueDate: yesterday }, now)).toBe(true);
    });

    it('is not overdue before the due date', () => {
        expect(isTaskOverdue({ status: TaskStatus.TODO, dueDate: tomorrow }, now)).toBe(false);
    });

    it('never marks closed tasks overdue', () => {
        expect(isTaskOverdue({ status: TaskStatus.COMPLETED, dueDate: yesterday }, now)).toBe(false);
        expect(isTaskOverdue({ status: TaskStatus.CANCELLED, dueDate: yesterday }, now)).toBe(false);
    });

    it('ignores tasks without a due date', () => {
        expect(isTaskOverdue({ status: TaskStatus.TODO, dueDate: null }, now)).toBe(false);
    });
});

describe('getTaskProgress()', () => {
    it('uses the task status when there are no subtasks', () => {
        expect(getTaskProgress(TaskStatus.COMPLETED, [])).toBe(100);
        expect(getTaskProgress(TaskStatus.IN_REVIEW, [])).toBe(0);
    });

    it('rounds the share of completed subtasks down', () => {
        expect(getTaskProgress(TaskStatus.IN_PROGRESS, [TaskStatus.COMPLETED, TaskStatus.TODO, TaskStatus.TODO])).toBe(
            33,
        );
    });
});

describe('getCompletedAt()', () => {
    it('stamps the time when a task is completed', () => {
        expect(getCompletedAt(TaskStatus.IN_REVIEW, TaskStatus.COMPLETED, null, now)).toBe(now);
    });

    it('keeps the original stamp while the task stays completed', () => {
        expect(getCompletedAt(TaskStatus.COMPLETED, TaskStatus.COMPLETED, yesterday, now)).toBe(yesterday);
    });

    it('clears the stamp when a task is reopened', () => {
        expect(getCompletedAt(TaskStatus.COMPLETED, TaskStatus.TODO, yesterday, now)).toBeNull();
    });
});

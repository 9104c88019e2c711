/**
 * Unit tests for JobList and task range expansion
 */

import { DomainError } from '../errors';
import {
    JobList, doesJobContainTaskRange, extrapolateTasksToJobs, filterJobs, isExpandedTask, isJobRunning, serializeJob,
} from '../jobList';
import { Job } from '../types';

const createMockJob = (overrides: Partial<Job> = {}): Job => ({
    stateAttribute: 'running',
    state: 'r',
    jobNumber: 1,
    priority: 0.5,
    name: 'test_job',
    owner: 'alice',
    startTime: '2024-01-15T10:00:00',
    slots: 1,
    ...overrides,
});

const rangeJob = (source: string): Job => createMockJob({
    stateAttribute: 'pending',
    state: 'qw',
    jobNumber: 104,
    startTime: undefined,
    submittedTime: '2024-01-15T11:30:00',
    tasks: { kind: 'range', source, taskID: 0 },
});

describe('isJobRunning', () => {
    it('should only treat state r as running', () => {
        expect(isJobRunning(createMockJob({ state: 'r' }))).toBe(true);
        expect(isJobRunning(createMockJob({ state: 'qw' }))).toBe(false);
        expect(isJobRunning(createMockJob({ state: 'Rr' }))).toBe(false);
    });
});

describe('doesJobContainTaskRange', () => {
    it('should detect a range', () => {
        expect(doesJobContainTaskRange(rangeJob('1-10:1'))).toBe(true);
    });

    it('should detect a range inside a longer source', () => {
        expect(doesJobContainTaskRange(rangeJob('x1-100:10y'))).toBe(true);
    });

    it('should be false for a plain task id', () => {
        expect(doesJobContainTaskRange(createMockJob({ tasks: { kind: 'id', source: '42', taskID: 42 } }))).toBe(false);
    });

    it('should be false without tasks', () => {
        expect(doesJobContainTaskRange(createMockJob())).toBe(false);
    });
});

describe('extrapolateTasksToJobs', () => {
    it('should produce one job per task id', () => {
        const original = rangeJob('40-55:5');
        const jobs = extrapolateTasksToJobs(original);

        expect(jobs.map(j => j.tasks?.taskID)).toEqual([40, 45, 50, 55]);
        jobs.forEach((job, i) => {
            expect(job).toEqual({ ...original, tasks: { kind: 'range', source: '40-55:5', taskID: 40 + i * 5, expanded: true } });
        });
    });

    it('should handle multi-digit steps', () => {
        const jobs = extrapolateTasksToJobs(rangeJob('1-100:10'));
        expect(jobs.map(j => j.tasks?.taskID)).toEqual([1, 11, 21, 31, 41, 51, 61, 71, 81, 91]);
    });

    it('should stop at the last id not beyond the end', () => {
        expect(extrapolateTasksToJobs(rangeJob('40-54:5')).map(j => j.tasks?.taskID)).toEqual([40, 45, 50]);
    });

    it('should yield a single job for a one-element range', () => {
        expect(extrapolateTasksToJobs(rangeJob('5-5:1'))).toHaveLength(1);
    });

    it('should not mark the unexpanded job', () => {
        expect(isExpandedTask(rangeJob('1-3:1'))).toBe(false);
    });

    it('should leave the original job untouched', () => {
        const original = rangeJob('1-3:1');
        extrapolateTasksToJobs(original);
        expect(original.tasks).toEqual({ kind: 'range', source: '1-3:1', taskID: 0 });
    });

    it('should fail with a DomainError for a job without a range', () => {
        const job = createMockJob({ jobNumber: 42, tasks: { kind: 'id', source: '42', taskID: 42 } });
        expect(() => extrapolateTasksToJobs(job)).toThrow(DomainError);
        expect(() => extrapolateTasksToJobs(job)).toThrow('Job 42 does not indicate a range of tasks');
    });

    it('should fail with a DomainError for a zero step', () => {
        expect(() => extrapolateTasksToJobs(rangeJob('1-10:0'))).toThrow(DomainError);
    });

    it('should fail with a DomainError when the range ends before it starts', () => {
        expect(() => extrapolateTasksToJobs(rangeJob('10-1:1'))).toThrow(DomainError);
    });
});

describe('JobList', () => {
    const jobs = [
        createMockJob({ jobNumber: 1, owner: 'alice', state: 'r', priority: 0.2 }),
        createMockJob({ jobNumber: 2, owner: 'bob', state: 'r', priority: 0.9 }),
        createMockJob({ jobNumber: 3, owner: 'alice', state: 'qw', priority: 0.5 }),
        createMockJob({ jobNumber: 4, owner: 'alice', state: 'r', priority: 0.7 }),
        createMockJob({ jobNumber: 5, owner: 'carol', state: 'qw', priority: 0.1 }),
    ];

    it('should compose filters in original order', () => {
        const list = new JobList(jobs);
        const result = list.filter(isJobRunning).filter(j => j.owner === 'alice');

        expect(result.map(j => j.jobNumber)).toEqual([1, 4]);
        expect(list).toHaveLength(5);
    });

    it('should filter through the free function', () => {
        expect(filterJobs(new JobList(jobs), j => j.owner === 'carol').map(j => j.jobNumber)).toEqual([5]);
    });

    it('should sort in place and return the same list', () => {
        const list = new JobList(jobs);
        const result = list.sort((i, j) => jobs[i].priority > jobs[j].priority);

        expect(result).toBe(list);
        expect(list.map(j => j.jobNumber)).toEqual([2, 4, 3, 1, 5]);
    });

    it('should be iterable and indexable', () => {
        const list = new JobList(jobs);
        expect([...list].map(j => j.jobNumber)).toEqual([1, 2, 3, 4, 5]);
        expect(list.at(-1)?.jobNumber).toBe(5);
        expect(list.at(10)).toBeUndefined();
    });

    it('should expand task ranges in place of the range job', () => {
        const list = new JobList([createMockJob({ jobNumber: 1 }), rangeJob('1-3:1'), createMockJob({ jobNumber: 3 })]);
        const expanded = list.expandTaskRanges();

        expect(expanded.map(j => j.jobNumber)).toEqual([1, 104, 104, 104, 3]);
        expect(expanded.map(j => j.tasks?.taskID)).toEqual([undefined, 1, 2, 3, undefined]);
        expect(expanded.expandTaskRanges()).toHaveLength(5);
    });

    it('should not expand a range starting at task 0 twice', () => {
        const expanded = new JobList([rangeJob('0-4:2')]).expandTaskRanges();

        expect(expanded.map(j => j.tasks?.taskID)).toEqual([0, 2, 4]);
        expect(expanded.map(isExpandedTask)).toEqual([true, true, true]);
        expect(expanded.expandTaskRanges().map(j => j.tasks?.taskID)).toEqual([0, 2, 4]);
        expect(expanded.toJSON()[0].task_id).toBe(0);
        expect(expanded.toJSON()[0].tasks).toBe('0-4:2');
    });

    it('should serialize to interchange records', () => {
        const list = new JobList([rangeJob('40-55:5')]).expandTaskRanges();
        expect(list.toJSON()[1]).toEqual({
            state_attribute_text: 'pending',
            state: 'qw',
            jb_job_number: 104,
            jat_prio: 0.5,
            jb_name: 'test_job',
            jb_owner: 'alice',
            start_time: '',
            submitted_time: '2024-01-15T11:30:00',
            slots: 1,
            tasks: '40-55:5',
            task_id: 45,
        });
    });
});

describe('serializeJob', () => {
    it('should write a plain task id', () => {
        const record = serializeJob(createMockJob({ tasks: { kind: 'id', source: '7', taskID: 7 } }));
        expect(record.tasks).toBe('7');
        expect(record.task_id).toBe(7);
    });

    it('should omit absent tasks', () => {
        const record = serializeJob(createMockJob());
        expect(record).not.toHaveProperty('tasks');
        expect(record).not.toHaveProperty('task_id');
        expect(record.start_time).toBe('2024-01-15T10:00:00');
    });
});

import { DomainError } from './errors';
import { parseInteger } from './numbers';
import { TASK_RANGE_PATTERN, encodeTask } from './task';
import { Job, JobRecord } from './types';

export type JobPredicate = (job: Job) => boolean;

export function isJobRunning(job: Job): boolean {
    return job.state === 'r';
}

/**
 * Whether the job's tasks element holds a compressed range such as "1-10:1"
 */
export function doesJobContainTaskRange(job: Job): boolean {
    return job.tasks !== undefined && TASK_RANGE_PATTERN.test(job.tasks.source);
}

/**
 * Whether the job is one task materialized from a range
 */
export function isExpandedTask(job: Job): boolean {
    return job.tasks?.kind === 'range' && job.tasks.expanded === true;
}

/**
 * Expands a job whose tasks element is a range into one job per task id,
 * in ascending order. Every other field is copied from the original.
 */
export function extrapolateTasksToJobs(original: Job): Job[] {
    const tasks = original.tasks;
    const match = tasks ? TASK_RANGE_PATTERN.exec(tasks.source) : null;
    if (!tasks || !match) {
        throw new DomainError(`Job ${original.jobNumber} does not indicate a range of tasks`);
    }

    const [rangeComponent, stepComponent] = match[0].split(':');
    const [beginComponent, endComponent] = rangeComponent.split('-');

    const begin = parseInteger(beginComponent);
    const end = parseInteger(endComponent);
    const step = parseInteger(stepComponent);

    if (step <= 0) {
        throw new DomainError(`Job ${original.jobNumber} has a non-positive task step: ${match[0]}`);
    }
    if (begin > end) {
        throw new DomainError(`Job ${original.jobNumber} has a task range that ends before it starts: ${match[0]}`);
    }

    const jobs: Job[] = [];
    for (let i = begin; i <= end; i += step) {
        jobs.push({ ...original, tasks: { kind: 'range', source: tasks.source, taskID: i, expanded: true } });
    }
    return jobs;
}

export function serializeJob(job: Job): JobRecord {
    const record: JobRecord = {
        state_attribute_text: job.stateAttribute,
        state: job.state,
        jb_job_number: job.jobNumber,
        jat_prio: job.priority,
        jb_name: job.name,
        jb_owner: job.owner,
        start_time: job.startTime ?? '',
        submitted_time: job.submittedTime ?? '',
        slots: job.slots,
    };
    const tasks = job.tasks ? encodeTask(job.tasks) : undefined;
    if (tasks !== undefined) record.tasks = tasks;
    if (job.tasks && (job.tasks.taskID !== 0 || isExpandedTask(job))) record.task_id = job.tasks.taskID;
    return record;
}

/**
 * Ordered collection of jobs with chainable filtering and sorting.
 * Not internally synchronized: sort() mutates the list, so callers sharing
 * one list must serialize writers themselves.
 */
export class JobList implements Iterable<Job> {
    private readonly jobs: Job[];

    constructor(jobs: Iterable<Job> = []) {
        this.jobs = [...jobs];
    }

    get length(): number { return this.jobs.length; }

    at(index: number): Job | undefined { return this.jobs.at(index); }

    [Symbol.iterator](): Iterator<Job> { return this.jobs[Symbol.iterator](); }

    /**
     * Returns a new list with the jobs matching the predicate, in their original order
     */
    filter(predicate: JobPredicate): JobList {
        return new JobList(this.jobs.filter(job => predicate(job)));
    }

    /**
     * Sorts in place with a positional less-than comparator and returns this list.
     * Stability is whatever Array.prototype.sort provides.
     */
    sort(less: (i: number, j: number) => boolean): JobList {
        const indexed = this.jobs.map((job, index) => ({ job, index }));
        indexed.sort((a, b) => {
            if (less(a.index, b.index)) return -1;
            if (less(b.index, a.index)) return 1;
            return 0;
        });
        indexed.forEach(({ job }, index) => { this.jobs[index] = job; });
        return this;
    }

    map<T>(fn: (job: Job, index: number) => T): T[] {
        return this.jobs.map(fn);
    }

    /**
     * Replaces every job carrying an unexpanded task range with its expanded jobs.
     * Jobs already produced by an expansion are kept as they are.
     */
    expandTaskRanges(): JobList {
        return new JobList(this.jobs.flatMap(job =>
            doesJobContainTaskRange(job) && !isExpandedTask(job) ? extrapolateTasksToJobs(job) : [job]));
    }

    toArray(): Job[] { return [...this.jobs]; }

    toJSON(): JobRecord[] { return this.jobs.map(serializeJob); }
}

export function filterJobs(jobs: JobList, predicate: JobPredicate): JobList {
    return jobs.filter(predicate);
}

import { JobPredicate } from './jobList';
import { logger as baseLogger } from './logger';
import { Job } from './types';

const ISO8601_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,3}))?$/;

const logger = baseLogger.child({ component: 'filters' });

/**
 * Parses a qstat timestamp such as "2024-01-15T10:00:00" as UTC.
 * Returns undefined for anything that is not a valid calendar time.
 */
export function parseSchedulerTime(value: string): Date | undefined {
    const m = ISO8601_PATTERN.exec(value);
    if (!m) return undefined;

    const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
    const millis = m[7] ? Number(m[7].padEnd(3, '0')) : 0;
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));

    const valid = date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
        && date.getUTCHours() === hour && date.getUTCMinutes() === minute && date.getUTCSeconds() === second;
    return valid ? date : undefined;
}

// A job whose submission time is missing or unparseable never matches
function submittedTimeOf(job: Job): Date | undefined {
    const submitted = job.submittedTime ? parseSchedulerTime(job.submittedTime) : undefined;
    if (!submitted) {
        logger.warn(`Excluding job ${job.jobNumber}: unparseable submission time "${job.submittedTime ?? ''}"`);
    }
    return submitted;
}

export function newBeforeSubmitTimeFilter(t: Date): JobPredicate {
    return job => {
        const submitted = submittedTimeOf(job);
        return submitted !== undefined && submitted.getTime() < t.getTime();
    };
}

export function newAfterSubmitTimeFilter(t: Date): JobPredicate {
    return job => {
        const submitted = submittedTimeOf(job);
        return submitted !== undefined && submitted.getTime() > t.getTime();
    };
}

/**
 * Jobs submitted strictly between start and end
 */
export function newBetweenSubmitTimeFilter(start: Date, end: Date): JobPredicate {
    return job => {
        const submitted = submittedTimeOf(job);
        return submitted !== undefined && submitted.getTime() > start.getTime() && submitted.getTime() < end.getTime();
    };
}

export function stateFilter(state: string): JobPredicate {
    return job => job.state === state;
}

export function ownerFilter(owner: string): JobPredicate {
    return job => job.owner === owner;
}

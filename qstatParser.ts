import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { ParseError } from './errors';
import { parseFloat64, parseInt32, parseInteger } from './numbers';
import { ResourceList } from './resources';
import { decodeTask, encodeTask } from './task';
import { Job, JobInfo, Queue } from './types';

const ARRAY_TAGS = new Set(['Queue-List', 'job_list', 'resource']);

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: '#text',
    ignoreDeclaration: true,
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (tagName: string) => ARRAY_TAGS.has(tagName),
});

const RawJobSchema = z.object({
    '@_state': z.string().default(''),
    state: z.string().default(''),
    JB_job_number: z.string(),
    JAT_prio: z.string().default('0'),
    JB_name: z.string().default(''),
    JB_owner: z.string().default(''),
    JAT_start_time: z.string().optional(),
    JB_submission_time: z.string().optional(),
    slots: z.string().default('0'),
    tasks: z.string().optional(),
});

export type RawJob = z.infer<typeof RawJobSchema>;

const RawResourceSchema = z.object({
    '@_name': z.string(),
    '@_type': z.string().default(''),
    '#text': z.string().default(''),
});

const RawQueueSchema = z.object({
    name: z.string().default(''),
    qtype: z.string().default(''),
    slots_used: z.string().default('0'),
    slots_resv: z.string().default('0'),
    slots_total: z.string().default('0'),
    load_avg: z.string().optional(),
    arch: z.string().optional(),
    resource: z.array(RawResourceSchema).default([]),
    job_list: z.array(RawJobSchema).default([]),
});

type RawQueue = z.infer<typeof RawQueueSchema>;

// An element with no content is parsed as an empty string
const section = <T extends z.ZodTypeAny>(schema: T) => z.union([z.literal(''), schema]).optional();

const RawDocumentSchema = z.object({
    job_info: z.object({
        queue_info: section(z.object({
            'Queue-List': z.array(RawQueueSchema).default([]),
            job_list: z.array(RawJobSchema).default([]),
        })),
        job_info: section(z.object({
            job_list: z.array(RawJobSchema).default([]),
        })),
    }),
});

/**
 * Decodes a single <job_list> entry. Fails with a ParseError naming the job
 * when a numeric field or the tasks element is malformed.
 */
export function decodeJob(raw: RawJob): Job {
    try {
        const job: Job = {
            stateAttribute: raw['@_state'],
            state: raw.state,
            jobNumber: parseInteger(raw.JB_job_number),
            priority: parseFloat64(raw.JAT_prio),
            name: raw.JB_name,
            owner: raw.JB_owner,
            slots: parseInt32(raw.slots),
        };
        if (raw.JAT_start_time) job.startTime = raw.JAT_start_time;
        if (raw.JB_submission_time) job.submittedTime = raw.JB_submission_time;
        if (raw.tasks) job.tasks = decodeTask(raw.tasks);
        return job;
    } catch (error) {
        if (error instanceof ParseError) {
            throw new ParseError(`Job ${raw.JB_job_number}: ${error.message}`, error.input, { cause: error });
        }
        throw error;
    }
}

function decodeQueue(raw: RawQueue): Queue {
    const queue: Queue = {
        name: raw.name,
        qtype: raw.qtype,
        slotsUsed: parseInt32(raw.slots_used),
        slotsReserved: parseInt32(raw.slots_resv),
        slotsTotal: parseInt32(raw.slots_total),
        resources: new ResourceList(raw.resource.map(r => ({ name: r['@_name'], type: r['@_type'], value: r['#text'] }))),
        jobList: raw.job_list.map(decodeJob),
    };
    if (raw.load_avg) queue.loadAverage = parseFloat64(raw.load_avg);
    if (raw.arch) queue.arch = raw.arch;
    return queue;
}

/**
 * Parses the output of `qstat -xml`. The whole document fails on the first
 * malformed element; no partially decoded result is returned.
 */
export function parseJobInfo(xml: string | Buffer): JobInfo {
    const text = typeof xml === 'string' ? xml : xml.toString('utf8');

    const validation = XMLValidator.validate(text);
    if (validation !== true) {
        const { msg, line, col } = validation.err;
        throw new ParseError(`Malformed qstat XML at ${line}:${col}: ${msg}`, text);
    }

    const document = RawDocumentSchema.safeParse(parser.parse(text));
    if (!document.success) {
        const issues = document.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ParseError(`Unexpected qstat XML structure: ${issues}`, text, { cause: document.error });
    }

    const { queue_info: queueInfo, job_info: pending } = document.data.job_info;
    const queues = queueInfo ? queueInfo['Queue-List'].map(decodeQueue) : [];

    // Without -f, running jobs sit directly under queue_info
    if (queueInfo && queueInfo.job_list.length > 0) {
        queues.push({
            name: '', qtype: '', slotsUsed: 0, slotsReserved: 0, slotsTotal: 0,
            resources: new ResourceList(), jobList: queueInfo.job_list.map(decodeJob),
        });
    }

    return {
        queueInfo: { queues },
        pendingJobs: { jobList: pending ? pending.job_list.map(decodeJob) : [] },
    };
}

/**
 * Renders jobs back to <job_list> elements
 */
export function buildJobListXml(jobs: Iterable<Job>, options: { format?: boolean } = {}): string {
    const builder = new XMLBuilder({
        ignoreAttributes: false,
        attributeNamePrefix: '@_',
        format: options.format ?? false,
    });

    const entries = [...jobs].map(job => {
        const entry: Record<string, string> = {
            '@_state': job.stateAttribute,
            JB_job_number: String(job.jobNumber),
            JAT_prio: String(job.priority),
            JB_name: job.name,
            JB_owner: job.owner,
            state: job.state,
        };
        if (job.startTime !== undefined) entry.JAT_start_time = job.startTime;
        if (job.submittedTime !== undefined) entry.JB_submission_time = job.submittedTime;
        entry.slots = String(job.slots);
        const tasks = job.tasks ? encodeTask(job.tasks) : undefined;
        if (tasks !== undefined) entry.tasks = tasks;
        return entry;
    });

    return builder.build({ job_list: entries });
}

import type { ResourceList } from './resources';

/**
 * Grid Engine job state codes as printed in the <state> element.
 * Codes combine, e.g. "hqw" is a held, queued and waiting job.
 */
export type JobState =
    | 'r'      // running
    | 'qw'     // queued and waiting
    | 'hqw'    // held in queue
    | 't'      // transferring to an execution host
    | 'Rr'     // restarted and running
    | 's'      // suspended
    | 'S'      // queue suspended
    | 'T'      // threshold reached
    | 'd'      // being deleted
    | 'dr'     // deleted while running
    | 'Eqw'    // error while queued
    | string;  // Allow unknown states

/**
 * The <tasks> element of a job. Either a single array task id, or a compressed
 * range such as "40-55:5" that stands for several pending tasks at once.
 * A range keeps taskID at 0 until it is expanded into one job per task; each
 * expanded job keeps the range source and is marked expanded.
 */
export type Task =
    | { kind: 'id'; source: string; taskID: number }
    | { kind: 'range'; source: string; taskID: number; expanded?: boolean };

/**
 * One job (or one array task after range expansion) as listed by qstat
 */
export interface Job {
    stateAttribute: string;
    state: JobState;
    jobNumber: number;
    priority: number;
    name: string;
    owner: string;
    startTime?: string;
    submittedTime?: string;
    slots: number;
    tasks?: Task;
}

/**
 * A named metric reported for a queue instance. The value is untyped text.
 */
export interface Resource {
    name: string;
    type: string;
    value: string;
}

export type StorageScale = 'M' | 'G' | 'T';

/**
 * A storage metric such as "10.2G" broken down to bytes
 */
export interface StorageValue {
    size: number;
    scale: StorageScale;
    bytes: number;
}

export type LoadWindow = 'short' | 'medium' | 'long';

/**
 * A queue instance from the queue_info section
 */
export interface Queue {
    name: string;
    qtype: string;
    slotsUsed: number;
    slotsReserved: number;
    slotsTotal: number;
    loadAverage?: number;
    arch?: string;
    resources: ResourceList;
    jobList: Job[];
}

/**
 * Parsed `qstat -xml` document: running jobs grouped per queue, then the pending list
 */
export interface JobInfo {
    queueInfo: { queues: Queue[] };
    pendingJobs: { jobList: Job[] };
}

/**
 * Interchange representation of a job
 */
export interface JobRecord {
    state_attribute_text: string;
    state: string;
    jb_job_number: number;
    jat_prio: number;
    jb_name: string;
    jb_owner: string;
    start_time: string;
    submitted_time: string;
    slots: number;
    tasks?: string;
    task_id?: number;
}

/**
 * Result of executing a shell command
 */
export interface CommandResult {
    success: boolean;
    stdout: string;
    stderr: string;
    exitCode: number;
}

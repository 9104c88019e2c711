#!/usr/bin/env node
import { Command } from 'commander';
import { GridEngineConfig } from './config';
import { GridEngineError } from './errors';
import { ownerFilter, stateFilter } from './filters';
import { GridEngineService } from './gridEngineService';
import { JobList } from './jobList';
import { logger } from './logger';
import { ResourceList } from './resources';
import { formatStorageValue } from './storageValue';
import { Job, StorageValue, Task } from './types';

type GlobalOptions = {
    sshHost?: string;
    sshUser?: string;
    sshKey?: string;
    qstat?: string;
};

type JobsOptions = {
    owner?: string;
    state?: string;
    expand?: boolean;
    json?: boolean;
};

type ResourcesOptions = {
    json?: boolean;
};

export type ServiceFactory = (overrides: Partial<GridEngineConfig>) => GridEngineService;

const COLUMNS = ['JOB', 'TASK', 'PRIO', 'NAME', 'OWNER', 'STATE', 'SLOTS', 'TIME'];

function taskLabel(task?: Task): string {
    if (!task) return '';
    if (task.kind === 'range') return task.expanded ? String(task.taskID) : task.source;
    return task.taskID === 0 ? '' : String(task.taskID);
}

function jobRow(job: Job): string[] {
    return [
        String(job.jobNumber), taskLabel(job.tasks), job.priority.toFixed(5), job.name, job.owner,
        job.state, String(job.slots), job.startTime ?? job.submittedTime ?? '',
    ];
}

export function formatJobTable(jobs: JobList): string {
    const rows = [COLUMNS, ...jobs.map(jobRow)];
    const widths = COLUMNS.map((_, c) => Math.max(...rows.map(r => r[c].length)));
    return rows.map(r => r.map((cell, c) => cell.padEnd(widths[c])).join('  ').trimEnd()).join('\n') + '\n';
}

function metric<T>(read: () => T, render: (value: T) => string): string {
    try {
        return render(read());
    } catch (error) {
        if (error instanceof GridEngineError) return `n/a (${error.message})`;
        throw error;
    }
}

export function formatResources(queueName: string, resources: ResourceList): string {
    const storage = (v: StorageValue) => `${formatStorageValue(v)} (${v.bytes} bytes)`;
    const lines: [string, string][] = [
        ['load_short', metric(() => resources.load('short'), String)],
        ['load_medium', metric(() => resources.load('medium'), String)],
        ['load_long', metric(() => resources.load('long'), String)],
        ['num_proc', metric(() => resources.numberOfProcessors(), String)],
        ['mem_total', metric(() => resources.totalMemory(), storage)],
        ['mem_used', metric(() => resources.memoryUsed(), storage)],
        ['mem_free', metric(() => resources.freeMemory(), storage)],
        ['swap_total', metric(() => resources.totalSwap(), storage)],
        ['swap_used', metric(() => resources.swapUsed(), storage)],
        ['swap_free', metric(() => resources.freeSwap(), storage)],
        ['virtual_total', metric(() => resources.totalVirtual(), storage)],
        ['virtual_free', metric(() => resources.freeVirtualMemory(), storage)],
    ];
    return [`Queue ${queueName}`, ...lines.map(([k, v]) => `  ${k.padEnd(14)}${v}`)].join('\n') + '\n';
}

export function createProgram(
    createService: ServiceFactory = overrides => new GridEngineService(overrides),
    write: (text: string) => void = text => { process.stdout.write(text); }
): Command {
    const program = new Command();

    program
        .name('gridengine-status')
        .description('Inspect Grid Engine jobs and queue resources from qstat XML')
        .version('0.1.0')
        .option('--ssh-host <host>', 'run qstat on a remote host over ssh')
        .option('--ssh-user <user>', 'ssh user')
        .option('--ssh-key <path>', 'ssh private key')
        .option('--qstat <command>', 'qstat command line to run');

    const serviceFor = (): GridEngineService => {
        const g = program.opts<GlobalOptions>();
        return createService({ sshHost: g.sshHost, sshUser: g.sshUser, sshKeyPath: g.sshKey, qstatCommand: g.qstat });
    };

    program.command('jobs')
        .description('List running and pending jobs')
        .option('-o, --owner <user>', 'only jobs owned by this user')
        .option('-s, --state <code>', 'only jobs in this state, e.g. r or qw')
        .option('-e, --expand', 'expand task ranges into one job per task')
        .option('--json', 'print JSON records')
        .action(async (options: JobsOptions) => {
            let jobs = await serviceFor().getJobs();
            if (options.expand) jobs = jobs.expandTaskRanges();
            if (options.owner) jobs = jobs.filter(ownerFilter(options.owner));
            if (options.state) jobs = jobs.filter(stateFilter(options.state));
            write(options.json ? `${JSON.stringify(jobs, null, 2)}\n` : formatJobTable(jobs));
        });

    program.command('resources')
        .description('Show load and memory metrics of a queue instance')
        .argument('<queue>', 'queue instance name, e.g. all.q@node01')
        .option('--json', 'print the raw resource list as JSON')
        .action(async (queue: string, options: ResourcesOptions) => {
            const resources = await serviceFor().getQueueResources(queue);
            write(options.json ? `${JSON.stringify(resources, null, 2)}\n` : formatResources(queue, resources));
        });

    return program;
}

/**
 * Runs the program, reporting a failure as "Error: <message>" with exit code 1
 */
export async function main(argv: string[], program: Command = createProgram()): Promise<void> {
    try {
        await program.parseAsync(argv);
    } catch (error) {
        logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    }
}

if (require.main === module) {
    void main(process.argv);
}

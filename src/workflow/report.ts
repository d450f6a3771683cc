/**
 * Workflow Report
 *
 * Plain-text summary of jobs grouped by status, followed by programmer workload.
 */

import { JOB_STATUSES, PRIORITY_LABELS } from '../constants';
import type { Job, JobStatus, ProgrammerWorkload } from './types';

/** Time from start to completion, in milliseconds */
export const programmingTime = (job: Job): number | null =>
    job.startedAt !== null && job.completedAt !== null ? job.completedAt - job.startedAt : null;

/** Time spent in IN_PROGRESS so far, in milliseconds */
export const elapsedInProgress = (job: Job, now: number): number | null =>
    job.startedAt !== null ? (job.completedAt ?? now) - job.startedAt : null;

const RULE = '='.repeat(80);
const SUBRULE = '-'.repeat(80);

const pad = (value: number): string => String(value).padStart(2, '0');

/** Local time as `YYYY-MM-DD HH:MM:SS` */
export const formatDateTime = (date: Date): string =>
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const formatHours = (ms: number): string => `${(ms / 3_600_000).toFixed(1)}h`;

export const priorityLabel = (priority: number): string => PRIORITY_LABELS[priority] || String(priority);

const formatJob = (job: Job, now: number): string[] => {
    const lines = [
        `  ${job.jobId}`,
        `    Customer: ${job.customer} | Part: ${job.partNumber} Rev: ${job.revision}`,
        `    Priority: ${priorityLabel(job.priority)}`,
    ];
    if (job.programmer !== null) {
        lines.push(`    Programmer: ${job.programmer}`);
    }
    const elapsed = elapsedInProgress(job, now);
    if (elapsed !== null) {
        lines.push(`    Time in progress: ${formatHours(elapsed)}`);
    }
    return lines;
};

const formatWorkload = (workload: ProgrammerWorkload): string => {
    const average = workload.avgProgrammingTimeHours !== null
        ? `, avg ${workload.avgProgrammingTimeHours.toFixed(1)}h`
        : '';
    return `  ${workload.programmer}: ${workload.activeJobs} active, ${workload.completedJobs} completed, ` +
        `${Math.round(workload.capacityPercent)}% capacity${average}`;
};

export const formatReport = (
    jobs: Job[],
    workloads: ProgrammerWorkload[],
    generatedAt: Date,
    status?: JobStatus,
): string => {
    const lines = [RULE, 'CNC PROGRAMMING WORKFLOW REPORT', `Generated: ${formatDateTime(generatedAt)}`, RULE];
    const statuses = status ? [status] : JOB_STATUSES;

    for (const current of statuses) {
        const matching = jobs
            .filter(job => job.status === current)
            .sort((a, b) => b.priority - a.priority || a.createdAt - b.createdAt);
        if (matching.length === 0) continue;

        lines.push('', `${current} (${matching.length} jobs)`, SUBRULE);
        for (const job of matching) {
            lines.push(...formatJob(job, generatedAt.getTime()));
        }
    }

    if (workloads.length > 0) {
        lines.push('', 'PROGRAMMER WORKLOAD', SUBRULE);
        lines.push(...workloads.map(formatWorkload));
    }

    return lines.join('\n');
};

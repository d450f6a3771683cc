/**
 * Workflow Manager
 *
 * Tracks CNC programming jobs from intake through review. State lives in
 * `jobs.json` and `programmers.json` under the workflow directory and is
 * rewritten after every change.
 */

import * as fs from 'fs/promises';
import * as path from 'node:path';
import type { z } from 'zod';
import {
    JobsFileSchema,
    ProgrammersFileSchema,
    type Job,
    type JobStatus,
    type NewJob,
    type ProgrammerStats,
    type ProgrammerWorkload,
    type WorkflowConfig,
} from './types';
import { DEFAULT_MAX_CAPACITY_PERCENT, DEFAULT_PRIORITY, MAX_ACTIVE_JOBS } from '../constants';
import { errorCode } from '../errors';
import * as Logging from '../logging';
import { formatReport, programmingTime } from './report';

export interface WorkflowInstance {
    createJob(job: NewJob): Promise<Job>;
    assignJob(jobId: string, programmer: string): Promise<boolean>;
    startJob(jobId: string): Promise<boolean>;
    completeJob(jobId: string, notes?: string): Promise<boolean>;
    approveJob(jobId: string, notes?: string): Promise<boolean>;
    closeJob(jobId: string): Promise<boolean>;
    getJob(jobId: string): Job | undefined;
    getJobs(): Job[];
    getJobsByStatus(status: JobStatus): Job[];
    getJobsByProgrammer(programmer: string): Job[];
    getProgrammers(): string[];
    getProgrammerWorkload(programmer: string): ProgrammerWorkload;
    getAvailableProgrammers(maxCapacity?: number): ProgrammerWorkload[];
    suggestProgrammer(priority?: number): string | null;
    generateReport(status?: JobStatus): string;
}

export const JOBS_FILE = 'jobs.json';
export const PROGRAMMERS_FILE = 'programmers.json';

const readJson = async <T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | undefined> => {
    let content: string;
    try {
        content = await fs.readFile(file, 'utf-8');
    } catch (error) {
        if (errorCode(error) === 'ENOENT') return undefined;
        throw error;
    }
    const data: unknown = JSON.parse(content);
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        throw new Error(`Invalid workflow data in ${file}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }
    return parsed.data;
};

export const create = async (config: WorkflowConfig): Promise<WorkflowInstance> => {
    const logger = Logging.getLogger();
    const now = config.now ?? (() => new Date());
    const jobsFile = path.join(config.workflowDirectory, JOBS_FILE);
    const programmersFile = path.join(config.workflowDirectory, PROGRAMMERS_FILE);

    await fs.mkdir(config.workflowDirectory, { recursive: true });

    const jobs = new Map<string, Job>(Object.entries(await readJson(jobsFile, JobsFileSchema) ?? {}));
    const programmers = new Map<string, ProgrammerStats>(Object.entries(await readJson(programmersFile, ProgrammersFileSchema) ?? {}));
    logger.debug('Loaded %d job(s) and %d programmer(s) from %s', jobs.size, programmers.size, config.workflowDirectory);

    const save = async (): Promise<void> => {
        await fs.writeFile(jobsFile, JSON.stringify(Object.fromEntries(jobs), null, 2), 'utf-8');
        await fs.writeFile(programmersFile, JSON.stringify(Object.fromEntries(programmers), null, 2), 'utf-8');
    };

    const addNote = (job: Job, note: string | undefined): void => {
        if (note) {
            job.notes.push(`${now().toISOString()}: ${note}`);
        }
    };

    // Applies a change to a known job and persists it; unknown ids change nothing
    const update = async (jobId: string, change: (job: Job, at: number) => void): Promise<boolean> => {
        const job = jobs.get(jobId);
        if (!job) {
            logger.warn('Unknown job: %s', jobId);
            return false;
        }
        change(job, now().getTime());
        await save();
        return true;
    };

    const createJob = async (input: NewJob): Promise<Job> => {
        const createdAt = now().getTime();
        const baseId = `${input.customer}_${input.partNumber}_${input.revision}_${Math.floor(createdAt / 1000)}`;
        let jobId = baseId;
        for (let counter = 2; jobs.has(jobId); counter++) {
            jobId = `${baseId}_${counter}`;
        }

        const job: Job = {
            jobId,
            customer: input.customer,
            partNumber: input.partNumber,
            revision: input.revision,
            status: 'INTAKE',
            programmer: null,
            createdAt,
            assignedAt: null,
            startedAt: null,
            completedAt: null,
            reviewedAt: null,
            priority: input.priority ?? DEFAULT_PRIORITY,
            notes: [],
        };
        addNote(job, input.notes);

        jobs.set(jobId, job);
        await save();
        logger.debug('Created job %s', jobId);
        return job;
    };

    const assignJob = (jobId: string, programmer: string): Promise<boolean> =>
        update(jobId, (job, at) => {
            job.programmer = programmer;
            job.status = 'QUEUED';
            job.assignedAt = at;

            const stats = programmers.get(programmer) ?? { activeJobs: 0, completedJobs: 0 };
            stats.activeJobs += 1;
            programmers.set(programmer, stats);
        });

    const startJob = (jobId: string): Promise<boolean> =>
        update(jobId, (job, at) => {
            job.status = 'IN_PROGRESS';
            job.startedAt = at;
        });

    const completeJob = (jobId: string, notes?: string): Promise<boolean> =>
        update(jobId, (job, at) => {
            job.status = 'REVIEW';
            job.completedAt = at;
            addNote(job, notes);
        });

    const approveJob = (jobId: string, notes?: string): Promise<boolean> =>
        update(jobId, (job, at) => {
            job.status = 'READY';
            job.reviewedAt = at;
            addNote(job, notes);

            const stats = job.programmer !== null ? programmers.get(job.programmer) : undefined;
            if (stats) {
                stats.activeJobs -= 1;
                stats.completedJobs += 1;
            }
        });

    const closeJob = (jobId: string): Promise<boolean> =>
        update(jobId, (job) => {
            job.status = 'COMPLETED';
        });

    const getJobsByStatus = (status: JobStatus): Job[] =>
        Array.from(jobs.values()).filter(job => job.status === status);

    const getJobsByProgrammer = (programmer: string): Job[] =>
        Array.from(jobs.values()).filter(job => job.programmer === programmer);

    const getProgrammerWorkload = (programmer: string): ProgrammerWorkload => {
        if (!programmers.has(programmer)) {
            return { programmer, activeJobs: 0, completedJobs: 0, avgProgrammingTimeHours: null, capacityPercent: 0 };
        }

        const assigned = getJobsByProgrammer(programmer);
        const activeJobs = assigned.filter(job => job.status === 'QUEUED' || job.status === 'IN_PROGRESS').length;
        const completedJobs = assigned.filter(job => job.status === 'READY' || job.status === 'COMPLETED').length;

        const times = assigned
            .map(programmingTime)
            .filter((time): time is number => time !== null);
        const avgMs = times.length > 0 ? times.reduce((sum, time) => sum + time, 0) / times.length : null;

        return {
            programmer,
            activeJobs,
            completedJobs,
            avgProgrammingTimeHours: avgMs !== null ? avgMs / 3_600_000 : null,
            capacityPercent: Math.min(100, (activeJobs / MAX_ACTIVE_JOBS) * 100),
        };
    };

    const getAvailableProgrammers = (maxCapacity = DEFAULT_MAX_CAPACITY_PERCENT): ProgrammerWorkload[] =>
        Array.from(programmers.keys())
            .map(getProgrammerWorkload)
            .filter(workload => workload.capacityPercent < maxCapacity)
            .sort((a, b) => a.capacityPercent - b.capacityPercent);

    // Least loaded first regardless of priority
    const suggestProgrammer = (_priority = DEFAULT_PRIORITY): string | null =>
        getAvailableProgrammers()[0]?.programmer ?? null;

    const generateReport = (status?: JobStatus): string =>
        formatReport(
            Array.from(jobs.values()),
            Array.from(programmers.keys()).sort().map(getProgrammerWorkload),
            now(),
            status,
        );

    return {
        createJob,
        assignJob,
        startJob,
        completeJob,
        approveJob,
        closeJob,
        getJob: (jobId) => jobs.get(jobId),
        getJobs: () => Array.from(jobs.values()),
        getJobsByStatus,
        getJobsByProgrammer,
        getProgrammers: () => Array.from(programmers.keys()).sort(),
        getProgrammerWorkload,
        getAvailableProgrammers,
        suggestProgrammer,
        generateReport,
    };
};

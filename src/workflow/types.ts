/**
 * Workflow Types
 *
 * CNC programming jobs and programmer workload.
 */

import { z } from 'zod';
import { JOB_STATUSES } from '../constants';

export type JobStatus = typeof JOB_STATUSES[number];

export const JobSchema = z.object({
    jobId: z.string(),
    customer: z.string(),
    partNumber: z.string(),
    revision: z.string(),
    status: z.enum(JOB_STATUSES),
    programmer: z.string().nullable(),
    createdAt: z.number(),
    assignedAt: z.number().nullable(),
    startedAt: z.number().nullable(),
    completedAt: z.number().nullable(),
    reviewedAt: z.number().nullable(),
    priority: z.number().int().min(1).max(4),
    notes: z.array(z.string()),
});

export const JobsFileSchema = z.record(z.string(), JobSchema);

export const ProgrammerStatsSchema = z.object({
    activeJobs: z.number().int(),
    completedJobs: z.number().int(),
});

export const ProgrammersFileSchema = z.record(z.string(), ProgrammerStatsSchema);

export type Job = z.infer<typeof JobSchema>;
export type ProgrammerStats = z.infer<typeof ProgrammerStatsSchema>;

export interface NewJob {
    customer: string;
    partNumber: string;
    revision: string;
    priority?: number;
    notes?: string;
}

export interface ProgrammerWorkload {
    programmer: string;
    activeJobs: number;
    completedJobs: number;
    avgProgrammingTimeHours: number | null;
    capacityPercent: number;
}

export interface WorkflowConfig {
    workflowDirectory: string;
    now?: () => Date;
}

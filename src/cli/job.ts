/**
 * Job CLI Commands
 *
 * Track CNC programming jobs: intake, assignment, programming, review.
 */

/* eslint-disable no-console */
import { Command } from 'commander';
import * as path from 'node:path';
import { DEFAULT_PRIORITY, DEFAULT_WORKFLOW_DIR, JOB_STATUSES } from '../constants';
import * as Workflow from '../workflow';
import type { Job, JobStatus } from '../workflow';

interface WorkflowOptions {
    workflowDirectory: string;
}

const isJobStatus = (value: string): value is JobStatus =>
    JOB_STATUSES.some(status => status === value);

const parsePriority = (value: string): number => {
    const priority = Number(value);
    if (!Number.isInteger(priority) || priority < 1 || priority > 4) {
        throw new Error(`Invalid priority "${value}". Use 1 (low) to 4 (urgent).`);
    }
    return priority;
};

const openWorkflow = (options: WorkflowOptions): Promise<Workflow.WorkflowInstance> =>
    Workflow.create({ workflowDirectory: path.resolve(options.workflowDirectory) });

export const formatJobLine = (job: Job): string =>
    `${job.jobId}  ${job.status.padEnd(11)}  ${Workflow.priorityLabel(job.priority).padEnd(6)}  ${job.programmer ?? '-'}`;

/**
 * Runs a job command, reporting failures the way every command does.
 */
const run = (action: () => Promise<void>): Promise<void> =>
    action().catch((error: unknown) => {
        console.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`);
        process.exit(1);
    });

const reportUpdate = (updated: boolean, jobId: string, message: string): void => {
    if (!updated) {
        console.error(`Error: Job not found: ${jobId}`);
        process.exit(1);
    }
    console.log(message);
};

/**
 * Register job commands
 */
export const registerJobCommands = (program: Command): void => {
    const job = program
        .command('job')
        .description('Track CNC programming jobs')
        .option('--workflow-directory <dir>', 'directory holding jobs.json and programmers.json', DEFAULT_WORKFLOW_DIR);

    const options = (): WorkflowOptions => job.opts<WorkflowOptions>();

    job
        .command('create <customer> <partNumber> <revision>')
        .description('Register a new job at INTAKE')
        .option('-p, --priority <priority>', 'priority 1 (low) to 4 (urgent)', String(DEFAULT_PRIORITY))
        .option('-n, --notes <notes>', 'note to attach')
        .action((customer: string, partNumber: string, revision: string, cmdOptions: { priority: string; notes?: string }) =>
            run(async () => {
                const workflow = await openWorkflow(options());
                const created = await workflow.createJob({
                    customer,
                    partNumber,
                    revision,
                    priority: parsePriority(cmdOptions.priority),
                    ...(cmdOptions.notes !== undefined && { notes: cmdOptions.notes }),
                });
                console.log(`Created job ${created.jobId}`);

                const suggested = workflow.suggestProgrammer(created.priority);
                if (suggested !== null) {
                    console.log(`Suggested programmer: ${suggested}`);
                }
            }));

    job
        .command('assign <jobId> <programmer>')
        .description('Assign a job to a programmer (QUEUED)')
        .action((jobId: string, programmer: string) =>
            run(async () => {
                const workflow = await openWorkflow(options());
                reportUpdate(await workflow.assignJob(jobId, programmer), jobId, `Assigned ${jobId} to ${programmer}`);
            }));

    job
        .command('start <jobId>')
        .description('Mark a job as IN_PROGRESS')
        .action((jobId: string) =>
            run(async () => {
                const workflow = await openWorkflow(options());
                reportUpdate(await workflow.startJob(jobId), jobId, `Started ${jobId}`);
            }));

    job
        .command('complete <jobId>')
        .description('Send a job to REVIEW')
        .option('-n, --notes <notes>', 'note to attach')
        .action((jobId: string, cmdOptions: { notes?: string }) =>
            run(async () => {
                const workflow = await openWorkflow(options());
                reportUpdate(await workflow.completeJob(jobId, cmdOptions.notes), jobId, `${jobId} ready for review`);
            }));

    job
        .command('approve <jobId>')
        .description('Approve a reviewed job (READY)')
        .option('-n, --notes <notes>', 'note to attach')
        .action((jobId: string, cmdOptions: { notes?: string }) =>
            run(async () => {
                const workflow = await openWorkflow(options());
                reportUpdate(await workflow.approveJob(jobId, cmdOptions.notes), jobId, `Approved ${jobId}`);
            }));

    job
        .command('close <jobId>')
        .description('Mark a job as COMPLETED')
        .action((jobId: string) =>
            run(async () => {
                const workflow = await openWorkflow(options());
                reportUpdate(await workflow.closeJob(jobId), jobId, `Closed ${jobId}`);
            }));

    job
        .command('list')
        .description('List jobs')
        .option('-s, --status <status>', `only jobs with this status (${JOB_STATUSES.join(', ')})`)
        .option('--programmer <programmer>', 'only jobs assigned to this programmer')
        .action((cmdOptions: { status?: string; programmer?: string }) =>
            run(async () => {
                const { status, programmer } = cmdOptions;
                if (status !== undefined && !isJobStatus(status)) {
                    console.error(`Error: Invalid status "${status}"`);
                    console.error(`Valid statuses are: ${JOB_STATUSES.join(', ')}`);
                    process.exit(1);
                }

                const workflow = await openWorkflow(options());
                let jobs = status !== undefined && isJobStatus(status)
                    ? workflow.getJobsByStatus(status)
                    : workflow.getJobs();
                if (programmer !== undefined) {
                    jobs = jobs.filter(entry => entry.programmer === programmer);
                }

                if (jobs.length === 0) {
                    console.log('No jobs found');
                    return;
                }
                jobs
                    .sort((a, b) => a.createdAt - b.createdAt)
                    .forEach(entry => console.log(formatJobLine(entry)));
            }));

    job
        .command('report')
        .description('Print the workflow report')
        .option('-s, --status <status>', 'only include this status')
        .action((cmdOptions: { status?: string }) =>
            run(async () => {
                const { status } = cmdOptions;
                if (status !== undefined && !isJobStatus(status)) {
                    console.error(`Error: Invalid status "${status}"`);
                    process.exit(1);
                }
                const workflow = await openWorkflow(options());
                console.log(workflow.generateReport(status !== undefined && isJobStatus(status) ? status : undefined));
            }));

    job
        .command('workload [programmer]')
        .description('Show programmer workload')
        .action((programmer: string | undefined) =>
            run(async () => {
                const workflow = await openWorkflow(options());
                const names = programmer !== undefined ? [programmer] : workflow.getProgrammers();
                if (names.length === 0) {
                    console.log('No programmers found');
                    return;
                }
                for (const name of names) {
                    const workload = workflow.getProgrammerWorkload(name);
                    console.log(`${name}: ${workload.activeJobs} active, ${workload.completedJobs} completed, ${Math.round(workload.capacityPercent)}% capacity`);
                }
            }));
};

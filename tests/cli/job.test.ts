/**
 * Tests for Job CLI Commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { formatJobLine, registerJobCommands } from '../../src/cli/job';
import * as Workflow from '../../src/workflow';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('Job CLI Commands', () => {
    let tempDir: string;
    let program: Command;
    let consoleLogSpy: ReturnType<typeof vi.spyOn>;
    let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

    const run = (...args: string[]) =>
        program.parseAsync(['node', 'test', 'job', '--workflow-directory', tempDir, ...args]);

    const seed = async (programmer?: string): Promise<Workflow.Job> => {
        const workflow = await Workflow.create({ workflowDirectory: tempDir, now: () => new Date(Date.UTC(2024, 0, 15, 8)) });
        const job = await workflow.createJob({ customer: 'ACME', partNumber: '4411', revision: 'B' });
        if (programmer !== undefined) {
            await workflow.assignJob(job.jobId, programmer);
        }
        return workflow.getJob(job.jobId) ?? job;
    };

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'shopfloor-job-test-'));

        program = new Command();
        program.exitOverride();
        registerJobCommands(program);

        consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
        consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(process, 'exit').mockImplementation((code) => {
            throw new Error(`process.exit(${code})`);
        });
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    describe('job create', () => {
        it('should create a job and persist it', async () => {
            await run('create', 'ACME', '4411', 'B', '--priority', '3', '--notes', 'rush');

            expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringMatching(/^Created job ACME_4411_B_\d+$/));

            const workflow = await Workflow.create({ workflowDirectory: tempDir });
            const [job] = workflow.getJobs();
            expect(job?.priority).toBe(3);
            expect(job?.notes).toHaveLength(1);
        });

        it('should suggest the least loaded programmer', async () => {
            await seed('dana');
            await run('create', 'ACME', '7720', 'A');

            expect(consoleLogSpy).toHaveBeenCalledWith('Suggested programmer: dana');
        });

        it('should reject an out of range priority', async () => {
            await expect(run('create', 'ACME', '4411', 'B', '--priority', '9')).rejects.toThrow('process.exit(1)');

            expect(consoleErrorSpy).toHaveBeenCalledWith('Error: Invalid priority "9". Use 1 (low) to 4 (urgent).');
        });
    });

    describe('job transitions', () => {
        it('should assign, start, complete and approve a job', async () => {
            const { jobId } = await seed();

            await run('assign', jobId, 'dana');
            await run('start', jobId);
            await run('complete', jobId, '--notes', 'ready');
            await run('approve', jobId);

            expect(consoleLogSpy.mock.calls.map(call => call[0])).toEqual([
                `Assigned ${jobId} to dana`,
                `Started ${jobId}`,
                `${jobId} ready for review`,
                `Approved ${jobId}`,
            ]);

            const workflow = await Workflow.create({ workflowDirectory: tempDir });
            expect(workflow.getJob(jobId)?.status).toBe('READY');
        });

        it('should report an unknown job', async () => {
            await expect(run('start', 'nope')).rejects.toThrow('process.exit(1)');

            expect(consoleErrorSpy).toHaveBeenCalledWith('Error: Job not found: nope');
        });
    });

    describe('job list', () => {
        it('should list jobs one per line', async () => {
            const job = await seed('dana');
            await run('list');

            expect(consoleLogSpy).toHaveBeenCalledWith(formatJobLine(job));
            expect(formatJobLine(job)).toBe(`${job.jobId}  QUEUED       NORMAL  dana`);
        });

        it('should filter by status', async () => {
            await seed();
            await run('list', '--status', 'QUEUED');

            expect(consoleLogSpy).toHaveBeenCalledWith('No jobs found');
        });

        it('should reject an unknown status', async () => {
            await expect(run('list', '--status', 'DONE')).rejects.toThrow('process.exit(1)');

            expect(consoleErrorSpy).toHaveBeenCalledWith('Error: Invalid status "DONE"');
        });
    });

    describe('job report', () => {
        it('should print the workflow report', async () => {
            await seed('dana');
            await run('report');

            const output = String(consoleLogSpy.mock.calls[0]?.[0]);
            expect(output).toContain('CNC PROGRAMMING WORKFLOW REPORT');
            expect(output).toContain('QUEUED (1 jobs)');
            expect(output).toContain('  dana: 1 active, 0 completed, 10% capacity');
        });
    });

    describe('job workload', () => {
        it('should print each programmer', async () => {
            await seed('dana');
            await run('workload');

            expect(consoleLogSpy).toHaveBeenCalledWith('dana: 1 active, 0 completed, 10% capacity');
        });

        it('should say when nobody is registered', async () => {
            await run('workload');

            expect(consoleLogSpy).toHaveBeenCalledWith('No programmers found');
        });
    });
});

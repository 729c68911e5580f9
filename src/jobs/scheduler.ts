import logger from "../utils/logger";

export type JobSummary = Record<string, number>;

export type JobDefinition = {
  name: string;
  intervalMs: number;
  run: () => Promise<JobSummary>;
};

export type JobRunResult =
  | { status: "completed"; job: string; durationMs: number; summary: JobSummary }
  | { status: "skipped"; job: string; reason: "already_running" };

/**
 * In-process interval runner. A job never overlaps itself: a tick or a manual
 * run that finds it still running is skipped.
 */
export class JobScheduler {
  private readonly jobs = new Map<string, JobDefinition>();
  private readonly running = new Set<string>();
  private timers: NodeJS.Timeout[] = [];

  register(job: JobDefinition): this {
    if (this.jobs.has(job.name)) throw new Error(`Job "${job.name}" already registered`);
    this.jobs.set(job.name, job);
    return this;
  }

  has(name: string): boolean {
    return this.jobs.has(name);
  }

  names(): string[] {
    return Array.from(this.jobs.keys());
  }

  async run(name: string): Promise<JobRunResult> {
    const job = this.jobs.get(name);
    if (!job) throw new Error(`Unknown job "${name}"`);
    if (this.running.has(name)) {
      logger.warn(`[jobs] ${name} still running, skipped`);
      return { status: "skipped", job: name, reason: "already_running" };
    }

    this.running.add(name);
    const started = Date.now();
    try {
      const summary = await job.run();
      const durationMs = Date.now() - started;
      logger.info(`[jobs] ${name} done in ${durationMs}ms`, summary);
      return { status: "completed", job: name, durationMs, summary };
    } finally {
      this.running.delete(name);
    }
  }

  start() {
    if (this.timers.length > 0) return;
    for (const job of this.jobs.values()) {
      const timer = setInterval(() => {
        this.run(job.name).catch((err: unknown) => logger.error(`[jobs] ${job.name} failed`, err));
      }, job.intervalMs);
      timer.unref();
      this.timers.push(timer);
    }
    logger.info(`[jobs] scheduler started: ${this.names().join(", ")}`);
  }

  stop() {
    this.timers.forEach((t) => clearInterval(t));
    this.timers = [];
  }
}

import { Logger } from '../utils/logger.js';

interface BaseProcessorOptions {
  serviceName: string;
}

interface ClaimedTask<Task> {
  task: Task;
  index: number;
}

/**
 * Fixed-size worker pool over a finite task sequence. Workers claim tasks one
 * at a time from a shared iterator until it is exhausted or `stop()` is called.
 */
export abstract class BaseProcessorService<Task> {
  protected readonly logger: Logger;
  private isRunning = false;
  private shouldStop = false;
  private fatalError: unknown = undefined;
  private claimChain: Promise<unknown> = Promise.resolve();

  constructor(options: BaseProcessorOptions) {
    this.logger = new Logger(options.serviceName);
  }

  /** Stops dispatching new tasks. Tasks already claimed run to completion. */
  stop(): void {
    if (!this.isRunning || this.shouldStop) {
      return;
    }

    this.logger.info('Stopping, no new tasks will be started');
    this.shouldStop = true;
  }

  protected get stopped(): boolean {
    return this.shouldStop;
  }

  protected async processAll(tasks: Iterable<Task> | AsyncIterable<Task>, workerCount: number): Promise<void> {
    if (this.isRunning) {
      throw new Error('Processor is already running');
    }

    const count = Math.max(1, Math.floor(workerCount));
    const iterator = this.toIterator(tasks);
    let nextIndex = 0;

    this.isRunning = true;
    this.shouldStop = false;
    this.fatalError = undefined;

    const claim = (): Promise<ClaimedTask<Task> | null> => {
      // Serialize claims so indexes follow input order
      const claimed = this.claimChain.then(async () => {
        if (this.shouldStop) {
          return null;
        }
        const next = await iterator.next();
        if (next.done) {
          return null;
        }
        return { task: next.value, index: nextIndex++ };
      });
      this.claimChain = claimed.catch(() => undefined);
      return claimed;
    };

    this.logger.debug(`Starting with ${count} worker${count === 1 ? '' : 's'}`);

    try {
      await Promise.all(
        Array.from({ length: count }, (_, index) => this.runWorker(index + 1, claim))
      );
    } finally {
      this.isRunning = false;
      await iterator.return?.();
    }

    if (this.fatalError !== undefined) {
      throw this.fatalError;
    }
  }

  protected abstract processTask(task: Task, index: number, workerId: number): Promise<void>;

  /** Throwing from here aborts the whole run. */
  protected abstract handleTaskError(task: Task, index: number, error: unknown, workerId: number): Promise<void>;

  private async runWorker(
    workerId: number,
    claim: () => Promise<ClaimedTask<Task> | null>
  ): Promise<void> {
    this.logger.debug(`Worker ${workerId} started`);

    while (!this.shouldStop) {
      let claimed: ClaimedTask<Task> | null;
      try {
        claimed = await claim();
      } catch (error) {
        this.abort(error);
        break;
      }

      if (!claimed) {
        break;
      }

      try {
        await this.processTask(claimed.task, claimed.index, workerId);
      } catch (error) {
        try {
          await this.handleTaskError(claimed.task, claimed.index, error, workerId);
        } catch (fatal) {
          this.abort(fatal);
        }
      }
    }

    this.logger.debug(`Worker ${workerId} stopped`);
  }

  private abort(error: unknown): void {
    if (this.fatalError === undefined) {
      this.fatalError = error;
    }
    this.shouldStop = true;
  }

  private toIterator(tasks: Iterable<Task> | AsyncIterable<Task>): AsyncIterator<Task> | Iterator<Task> {
    if (isAsyncIterable(tasks)) {
      return tasks[Symbol.asyncIterator]();
    }
    return tasks[Symbol.iterator]();
  }
}

function isAsyncIterable<T>(value: Iterable<T> | AsyncIterable<T>): value is AsyncIterable<T> {
  return Symbol.asyncIterator in value;
}

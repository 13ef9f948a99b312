import { logger } from './logger.js';
import { errorMessage } from './errorHandling.js';

type ShutdownHandler = () => Promise<unknown> | unknown;

interface ShutdownStep {
  name: string;
  handler: ShutdownHandler;
  timeoutMs?: number;
}

export interface ShutdownStepResult {
  name: string;
  success: boolean;
  error?: string;
}

/**
 * Runs the registered shutdown steps once, in registration order.
 *
 * A failing or timed-out step is logged and the remaining steps still run.
 * Repeated signals while a shutdown is under way join the running one.
 */
export class ShutdownCoordinator {
  private readonly steps: ShutdownStep[] = [];
  private running: Promise<ShutdownStepResult[]> | null = null;

  /**
   * @param timeoutMs - Upper bound for a step registered without its own timeout
   */
  constructor(private readonly timeoutMs: number = 30000) {}

  register(name: string, handler: ShutdownHandler, timeoutMs?: number): void {
    this.steps.push({ name, handler, timeoutMs });
  }

  isShuttingDown(): boolean {
    return this.running !== null;
  }

  shutdown(signal?: string): Promise<ShutdownStepResult[]> {
    if (!this.running) {
      logger.info({ signal, steps: this.steps.length }, 'Starting graceful shutdown');
      this.running = this.runSteps();
    } else {
      logger.warn({ signal }, 'Shutdown already in progress');
    }
    return this.running;
  }

  private async runSteps(): Promise<ShutdownStepResult[]> {
    const results: ShutdownStepResult[] = [];
    for (const step of this.steps) {
      results.push(await this.runStep(step));
    }
    const failed = results.filter((result) => !result.success).length;
    logger.info({ total: results.length, failed }, 'Graceful shutdown completed');
    return results;
  }

  private async runStep(step: ShutdownStep): Promise<ShutdownStepResult> {
    const timeoutMs = step.timeoutMs ?? this.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Shutdown step ${step.name} timed out after ${timeoutMs}ms`)), timeoutMs);
      timer.unref();
    });

    try {
      await Promise.race([Promise.resolve().then(step.handler), timeout]);
      logger.debug({ step: step.name }, 'Shutdown step completed');
      return { name: step.name, success: true };
    } catch (error) {
      logger.error({ step: step.name, error: errorMessage(error) }, 'Shutdown step failed, continuing');
      return { name: step.name, success: false, error: errorMessage(error) };
    } finally {
      clearTimeout(timer);
    }
  }
}

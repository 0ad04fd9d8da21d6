import { errorMessage, FatalSessionError } from "../core/errors";
import { UiDriver } from "../driver/types";
import { Logger, MetricsRegistry } from "../observability";

export interface Session {
  readonly id: number;
  readonly driver: UiDriver;
}

export type UiDriverFactory = () => UiDriver;

interface SessionManagerDeps {
  createDriver: UiDriverFactory;
  logger: Logger;
  metrics: MetricsRegistry;
}

/**
 * Sole owner of the browser session. Workflows borrow the handle returned by
 * `acquire` for one chunk; after a fatal failure `invalidate` drops it so the next
 * `acquire` starts a fresh browser.
 */
export class SessionManager {
  private readonly deps: SessionManagerDeps;
  private current?: Session;
  private opened = 0;
  private closed = false;

  constructor(deps: SessionManagerDeps) {
    this.deps = deps;
  }

  get sessionsOpened(): number {
    return this.opened;
  }

  get active(): Session | undefined {
    return this.current;
  }

  async acquire(): Promise<Session> {
    if (this.closed) {
      throw new FatalSessionError("session manager already shut down");
    }
    if (this.current) {
      return this.current;
    }

    const driver = this.deps.createDriver();
    const id = this.opened + 1;
    try {
      await driver.open();
    } catch (error) {
      await this.closeQuietly({ id, driver }, "session_open_cleanup_failed");
      throw new FatalSessionError(`failed to open session: ${errorMessage(error)}`);
    }

    this.opened = id;
    this.current = { id, driver };
    this.deps.metrics.incrementCounter("sessions_opened");
    if (id > 1) {
      this.deps.metrics.incrementCounter("session_restarts");
    }
    this.deps.logger.info("session_opened", { sessionId: id });
    return this.current;
  }

  async invalidate(reason: string): Promise<void> {
    const session = this.current;
    if (!session) {
      return;
    }
    this.current = undefined;
    this.deps.logger.warn("session_invalidated", { sessionId: session.id, reason });
    await this.closeQuietly(session, "session_close_failed");
  }

  async shutdown(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const session = this.current;
    this.current = undefined;
    if (session) {
      await this.closeQuietly(session, "session_close_failed");
      this.deps.logger.info("session_closed", { sessionId: session.id });
    }
  }

  private async closeQuietly(session: Session, failureMsg: string): Promise<void> {
    try {
      await session.driver.close();
    } catch (error) {
      this.deps.logger.warn(failureMsg, { sessionId: session.id, error: errorMessage(error) });
    }
  }
}

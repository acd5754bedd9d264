import { allocate } from "./allocate.js";
import type { LabelConfig } from "./config_load.js";
import { UsbbwError } from "./errors.js";
import { type AnnotatedTopology, annotateTopology } from "./labels.js";
import { type DiscoveryState, type SnapshotDiff, createDiscoveryState, diffTopologies } from "./snapshot_diff.js";
import type { SysfsReadResult } from "./sysfs_read.js";
import { type Topology, buildTopology } from "./topology.js";

export type RefreshContext = {
  readSource: () => SysfsReadResult;
  config: LabelConfig;
};

export type Snapshot = {
  topology: Topology;
  annotated: AnnotatedTopology;
  diff: SnapshotDiff;
  warnings: UsbbwError[];
};

export type SessionState = {
  discovery: DiscoveryState;
  previous?: Topology;
};

export function createSession(): SessionState {
  return { discovery: createDiscoveryState() };
}

/** read → build → allocate → diff → label, as one synchronous step. */
export function refreshOnce(session: SessionState, ctx: RefreshContext): { snapshot: Snapshot; session: SessionState } {
  const read = ctx.readSource();
  const built = buildTopology(read.source);
  const topology = allocate(built.topology);
  const { diff, state } = diffTopologies(session.discovery, session.previous, topology);
  return {
    snapshot: {
      topology,
      annotated: annotateTopology(topology, ctx.config, diff),
      diff,
      warnings: [...read.warnings, ...built.warnings],
    },
    session: { discovery: state, previous: topology },
  };
}

export type SnapshotHandler = (snapshot: Snapshot) => void | Promise<void>;

/**
 * Periodic refresh. The next run is only scheduled once the previous one and
 * its handler have finished, so at most one refresh is ever in flight.
 */
export class RefreshLoop {
  private session: SessionState = createSession();
  private timer?: NodeJS.Timeout;
  private inFlight = false;
  private stopped = true;
  private resolveStopped?: () => void;

  constructor(
    private readonly ctx: RefreshContext,
    private readonly intervalMs: number,
    private readonly onSnapshot: SnapshotHandler,
    private readonly onError: (e: unknown) => void = (e) => console.error(e),
  ) {}

  start(): Promise<void> {
    this.stopped = false;
    const done = new Promise<void>((resolve) => {
      this.resolveStopped = resolve;
    });
    this.schedule(0);
    return done;
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    this.resolveStopped?.();
    this.resolveStopped = undefined;
  }

  get running(): boolean {
    return this.inFlight;
  }

  /** Runs one refresh unless one is already running; resolves false when skipped. */
  async tick(): Promise<boolean> {
    if (this.inFlight) return false;
    this.inFlight = true;
    try {
      const { snapshot, session } = refreshOnce(this.session, this.ctx);
      this.session = session;
      await this.onSnapshot(snapshot);
      return true;
    } finally {
      this.inFlight = false;
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.run().catch(this.onError);
    }, delayMs);
  }

  private async run(): Promise<void> {
    try {
      await this.tick();
    } catch (e) {
      this.onError(e);
    }
    if (!this.stopped) this.schedule(this.intervalMs);
  }
}

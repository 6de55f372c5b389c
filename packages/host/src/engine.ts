import { isWaypointColor, type ClaimRecord, type Logger, type ScanKind } from "@claimmark/core";
import {
  ConfigError,
  buildPatternSet,
  loadSettings,
  truncateAlias,
  withClaimPoint,
  type ClaimPointSettings,
  type PatternSet,
  type SettingsRepository
} from "@claimmark/patterns";
import {
  buildDiff,
  clearDiff,
  isEmptyDiff,
  reconcile,
  restyleDiff,
  summarizeClear,
  summarizeScan,
  summarizeVisibility,
  visibilityDiff,
  type Diff
} from "@claimmark/reconciler";
import {
  ClaimScanSession,
  SCAN_TIMEOUT_MS,
  WorldCatalogScan,
  type ClaimScanResult,
  type Diagnostic,
  type SessionOutcome,
  type WorldScanResult
} from "@claimmark/scanner";
import { applyDiff, type MarkerStore } from "./store.js";

/** Server command whose chat output the scanners read. */
export const CLAIM_LIST_COMMAND = "claimlist";

/** What the engine needs from the game client. */
export interface ClientBridge {
  sendCommand(command: string): void;
  showMessage(message: string): void;
}

export interface ClaimEngineOptions {
  store: MarkerStore;
  client: ClientBridge;
  settings: SettingsRepository;
  logger: Logger;
  timeoutMs?: number;
}

type ActiveScan =
  | { type: "claims"; session: ClaimScanSession }
  | { type: "worlds"; session: WorldCatalogScan };

export type EngineOutcome =
  | { scan: "claims"; outcome: SessionOutcome<ClaimScanResult>; diff?: Diff }
  | { scan: "worlds"; outcome: SessionOutcome<WorldScanResult> };

/**
 * Owns the validated pattern set, the single active scan and the known
 * world list, and applies scan results to the marker store. Lines and
 * clock ticks are pushed in by the host; nothing here runs on its own.
 */
export class ClaimEngine {
  private readonly store: MarkerStore;
  private readonly client: ClientBridge;
  private readonly settings: SettingsRepository;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private current: PatternSet;
  private active: ActiveScan | null = null;
  private knownWorlds: string[] = [];

  public constructor(options: ClaimEngineOptions) {
    this.store = options.store;
    this.client = options.client;
    this.settings = options.settings;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? SCAN_TIMEOUT_MS;
    this.current = loadSettings(options.settings, options.logger);
  }

  public get patterns(): PatternSet {
    return this.current;
  }

  public isScanning(): boolean {
    return this.active !== null;
  }

  /** When the active scan gives up, or null when idle. */
  public deadline(): number | null {
    return this.active ? this.active.session.startedAt + this.active.session.timeoutMs : null;
  }

  public getKnownWorlds(): readonly string[] {
    return this.knownWorlds;
  }

  public startClaimScan(world: string, kind: ScanKind, now: number): boolean {
    if (!this.ensureIdle()) return false;
    this.active = {
      type: "claims",
      session: new ClaimScanSession(this.current, { world, kind, startedAt: now, timeoutMs: this.timeoutMs })
    };
    this.client.sendCommand(CLAIM_LIST_COMMAND);
    return true;
  }

  public startWorldScan(now: number): boolean {
    if (!this.ensureIdle()) return false;
    this.active = {
      type: "worlds",
      session: new WorldCatalogScan(this.current, { startedAt: now, timeoutMs: this.timeoutMs })
    };
    this.client.sendCommand(CLAIM_LIST_COMMAND);
    return true;
  }

  public feedLine(line: string): EngineOutcome | null {
    if (!this.active) return null;
    this.active.session.feedLine(line);
    return this.settle(this.active);
  }

  public pollTimeout(now: number): EngineOutcome | null {
    if (!this.active) return null;
    this.active.session.pollTimeout(now);
    return this.settle(this.active);
  }

  public reconcile(records: readonly ClaimRecord[], kind: ScanKind): Diff {
    return reconcile(records, kind, this.store.listMarkers(), this.current);
  }

  public showClaimPoints(): number {
    return this.applyVisibility(true);
  }

  public hideClaimPoints(): number {
    return this.applyVisibility(false);
  }

  public clearClaimPoints(): number {
    const diff = clearDiff(this.store.listMarkers(), this.current);
    const removed = applyDiff(this.store, diff);
    this.client.showMessage(summarizeClear(removed));
    return removed;
  }

  public setNameFormat(nameFormat: string): boolean {
    try {
      this.adopt({ nameFormat });
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      this.client.showMessage(`'${nameFormat}' is not a valid name format. Requires %d for claim size.`);
      return false;
    }
    this.client.showMessage(`Set ClaimPoint name format to '${nameFormat}'.`);
    return true;
  }

  public setAlias(alias: string): boolean {
    const truncated = truncateAlias(alias);
    this.adopt({ alias: truncated });
    this.client.showMessage(`Set alias of all ClaimPoints to ${truncated}.`);
    return true;
  }

  public setColor(color: string): boolean {
    if (!isWaypointColor(color)) {
      this.client.showMessage(`'${color}' is not a valid color ID.`);
      return false;
    }
    this.adopt({ color });
    this.client.showMessage(`Set color of all ClaimPoints to ${color}.`);
    return true;
  }

  private ensureIdle(): boolean {
    if (this.active) {
      this.client.showMessage("A claim scan is already running, wait for it to finish.");
      return false;
    }
    return true;
  }

  /** Builds the new pattern set first so a rejected edit leaves everything untouched. */
  private adopt(patch: Partial<ClaimPointSettings>): void {
    const next = buildPatternSet(withClaimPoint(this.current.settings, patch));
    const diff = restyleDiff(this.store.listMarkers(), this.current, next);
    if (!isEmptyDiff(diff)) applyDiff(this.store, diff);
    this.current = next;
    this.settings.save(next.settings);
  }

  private applyVisibility(visible: boolean): number {
    const changed = applyDiff(this.store, visibilityDiff(this.store.listMarkers(), this.current, visible));
    this.client.showMessage(summarizeVisibility(visible, changed));
    return changed;
  }

  private settle(active: ActiveScan): EngineOutcome | null {
    if (!active.session.isTerminal()) {
      return active.type === "claims"
        ? { scan: "claims", outcome: active.session.outcome() }
        : { scan: "worlds", outcome: active.session.outcome() };
    }
    this.active = null;
    return active.type === "claims" ? this.finishClaimScan(active.session) : this.finishWorldScan(active.session);
  }

  private finishClaimScan(session: ClaimScanSession): EngineOutcome {
    const outcome = session.outcome();
    if (outcome.status !== "completed") {
      this.reportTimeout(outcome.status === "timed-out" ? outcome.elapsedMs : 0);
      return { scan: "claims", outcome };
    }

    const { records, kind, world } = outcome.result;
    this.logDiagnostics(outcome.result.diagnostics);
    if (records.length === 0) {
      // An empty report must not wipe the store; clean and update only run on real data.
      this.client.showMessage(summarizeScan(kind, world, 0, buildDiff([])));
      return { scan: "claims", outcome };
    }

    const diff = this.reconcile(records, kind);
    applyDiff(this.store, diff);
    this.logger.info(
      `${kind} '${world}': ${records.length} claims, ${diff.counts.create} created, ${diff.counts.delete} deleted, ${diff.counts.relabel} relabeled`
    );
    this.client.showMessage(summarizeScan(kind, world, records.length, diff));
    return { scan: "claims", outcome, diff };
  }

  private finishWorldScan(session: WorldCatalogScan): EngineOutcome {
    const outcome = session.outcome();
    if (outcome.status !== "completed") {
      this.reportTimeout(outcome.status === "timed-out" ? outcome.elapsedMs : 0);
      return { scan: "worlds", outcome };
    }
    this.logDiagnostics(outcome.result.diagnostics);
    this.knownWorlds = outcome.result.worlds;
    this.client.showMessage(
      this.knownWorlds.length === 0 ? "No claim worlds found." : `Claim worlds: ${this.knownWorlds.join(", ")}`
    );
    return { scan: "worlds", outcome };
  }

  private reportTimeout(elapsedMs: number): void {
    this.client.showMessage(`No response to /${CLAIM_LIST_COMMAND} after ${Math.round(elapsedMs / 1000)}s.`);
  }

  private logDiagnostics(diagnostics: readonly Diagnostic[]): void {
    for (const d of diagnostics) {
      this.logger.warn(`${d.code} at line ${d.line ?? "?"}: ${d.message}`);
    }
  }
}

import { vi } from "vitest";
import type { Logger, Marker, MarkerRef, Position } from "@claimmark/core";
import type { ClaimSettings, SettingsRepository } from "@claimmark/patterns";
import type { ClientBridge, MarkerStore } from "../src/index.js";

export class MemoryMarkerStore implements MarkerStore {
  private markers: Marker[] = [];
  private nextId = 1;

  public constructor(initial: Array<Omit<Marker, "id">> = []) {
    for (const m of initial) {
      this.markers.push({ ...m, id: this.nextId++ });
    }
  }

  public listMarkers(): Marker[] {
    return this.markers.map((m) => ({ ...m }));
  }

  public create(position: Position, label: string, alias: string, color: string): MarkerRef {
    const id = this.nextId++;
    this.markers.push({ id, x: position.x, z: position.z, label, alias, color, visible: true });
    return id;
  }

  public delete(ref: MarkerRef): boolean {
    const before = this.markers.length;
    this.markers = this.markers.filter((m) => m.id !== ref);
    return this.markers.length < before;
  }

  public relabel(ref: MarkerRef, label: string): boolean {
    return this.patch(ref, { label });
  }

  public restyle(ref: MarkerRef, alias: string, color: string): boolean {
    return this.patch(ref, { alias, color });
  }

  public setVisible(ref: MarkerRef, visible: boolean): boolean {
    return this.patch(ref, { visible });
  }

  public count(): number {
    return this.markers.length;
  }

  public transaction<T>(fn: () => T): T {
    return fn();
  }

  private patch(ref: MarkerRef, fields: Partial<Marker>): boolean {
    const target = this.markers.find((m) => m.id === ref);
    if (!target) return false;
    Object.assign(target, fields);
    return true;
  }
}

export class MemorySettings implements SettingsRepository {
  public stored: ClaimSettings | null;
  public saves = 0;

  public constructor(stored: ClaimSettings | null = null) {
    this.stored = stored;
  }

  public load(): ClaimSettings | null {
    return this.stored;
  }

  public save(settings: ClaimSettings): void {
    this.stored = settings;
    this.saves++;
  }
}

export function recordingClient(): ClientBridge & { commands: string[]; messages: string[] } {
  const commands: string[] = [];
  const messages: string[] = [];
  return {
    commands,
    messages,
    sendCommand: (command) => commands.push(command),
    showMessage: (message) => messages.push(message)
  };
}

export function quietLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function claimPoint(x: number, z: number, size: number, extra: Partial<Omit<Marker, "id">> = {}): Omit<Marker, "id"> {
  return { x, z, label: `Claim (${size})`, alias: "CP", color: "white", visible: true, ...extra };
}

export const REPORT_START = "5 blocks from play + 0 bonus = 5 total.";
export const REPORT_END = " = 900 blocks left to spend";

export function claimLine(world: string, x: number, z: number, size: number): string {
  return `${world}: x${x}, z${z} (${size} blocks)`;
}

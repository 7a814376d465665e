import type { EventLog, Height, SchedulerEvent } from "./types";

/** Append-only, in-process event log. */
export class MemoryEventLog implements EventLog {
  private readonly log: SchedulerEvent[] = [];

  append(event: SchedulerEvent) {
    this.log.push(event);
  }

  get events(): readonly SchedulerEvent[] {
    return this.log;
  }

  get length() {
    return this.log.length;
  }

  since(index: number): SchedulerEvent[] {
    return this.log.slice(index);
  }

  atHeight(height: Height): SchedulerEvent[] {
    return this.log.filter((e) => e.height === height);
  }
}

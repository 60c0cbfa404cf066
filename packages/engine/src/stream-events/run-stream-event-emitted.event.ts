import type { IEvent } from "@nestjs/cqrs";
import type { StreamEvent } from "@runstream/types";

export class RunStreamEventEmitted implements IEvent {
  constructor(public readonly event: StreamEvent) {}
}

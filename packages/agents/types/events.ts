// Investigation events
// Emitted by the orchestrator, dispatcher, specialists and synthesizer for observability

export type DomainEventType =
  // Orchestration
  | 'InvestigationRequested'
  | 'InvestigationCompleted'
  // Dispatch
  | 'SpecialistDispatched'
  | 'FindingRecorded'
  | 'SpecialistTimedOut'
  // Specialists
  | 'ToolCalled'
  | 'ToolSucceeded'
  | 'ToolFailed'
  // Synthesis
  | 'SynthesisAttempted'
  | 'SynthesisTierFailed'
  | 'SynthesisCompleted';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'InvestigationRequested',
  'InvestigationCompleted',
  'SpecialistDispatched',
  'FindingRecorded',
  'SpecialistTimedOut',
  'ToolCalled',
  'ToolSucceeded',
  'ToolFailed',
  'SynthesisAttempted',
  'SynthesisTierFailed',
  'SynthesisCompleted',
];

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: string;   // component name
  requestId?: string;
  payload: T;
}

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: (event: DomainEvent) => void): void;
  off(type: DomainEventType, handler: (event: DomainEvent) => void): void;
}

// Simple in-process event bus implementation
// Handlers are registered at startup; a throwing handler never breaks an investigation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<(event: DomainEvent) => void>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (!typeHandlers) return;
    for (const handler of typeHandlers) {
      try {
        handler(event);
      } catch (err) {
        console.error(
          `[EventBus:WARN] handler for ${event.type} threw`,
          err instanceof Error ? err.message : String(err),
        );
      }
    }
  }

  on(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: (event: DomainEvent) => void): void {
    this.handlers.get(type)?.delete(handler);
  }
}

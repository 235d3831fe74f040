import { Injectable } from '@nestjs/common';
import { DuplicateHandlerRegistrationError } from '../errors/duplicate-handler-registration.error';
import { HandlerNotRegisteredError } from '../errors/handler-not-registered.error';
import type {
  IStepHandler,
  JobKind,
} from '../interfaces/step-handler.interface';

/**
 * Dispatch table from job type to step handler. Populated explicitly by the
 * module; nothing is discovered at runtime.
 */
@Injectable()
export class StepHandlerRegistry {
  private readonly handlers = new Map<string, IStepHandler>();

  static fromHandlers(handlers: IStepHandler[]): StepHandlerRegistry {
    const registry = new StepHandlerRegistry();
    for (const handler of handlers) {
      registry.register(handler);
    }
    return registry;
  }

  register(handler: IStepHandler): void {
    const existing = this.handlers.get(handler.kind);
    if (existing) {
      throw new DuplicateHandlerRegistrationError(
        handler.kind,
        existing.constructor.name,
        handler.constructor.name,
      );
    }
    this.handlers.set(handler.kind, handler);
  }

  get(kind: string): IStepHandler | undefined {
    return this.handlers.get(kind);
  }

  getOrThrow(kind: string): IStepHandler {
    const handler = this.handlers.get(kind);
    if (!handler) {
      throw new HandlerNotRegisteredError(kind);
    }
    return handler;
  }

  kinds(): JobKind[] {
    return Array.from(this.handlers.values(), (handler) => handler.kind);
  }
}

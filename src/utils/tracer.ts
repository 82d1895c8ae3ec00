import { log } from './logger';

export interface Tracer {
    startActiveSpan<T>(module: string, method: string, metadata: Record<string, unknown>, callback: () => T): T;
}

class DebugTracer implements Tracer {
    private isEnabled = process.env.DEBUG?.includes('kafka-rack-rf') ?? false;

    startActiveSpan<T>(module: string, method: string, metadata: Record<string, unknown>, callback: () => T): T {
        if (!this.isEnabled) {
            return callback();
        }

        const startTime = Date.now();
        const onEnd = <R>(result: R): R => {
            log.debug(`[${module}.${method}] ${metadata.message ?? ''} +${Date.now() - startTime}ms`, metadata);
            return result;
        };

        const result = callback();
        if (result instanceof Promise) {
            return result.then(onEnd) as T;
        }
        return onEnd(result);
    }
}

let tracer: Tracer = new DebugTracer();

export const setTracer = (newTracer: Tracer) => {
    tracer = newTracer;
};

export const createTracer =
    (module: string) =>
    <Args extends unknown[]>(fn?: (...args: Args) => Record<string, unknown> | undefined) =>
    (_target: object, propertyKey: string, descriptor: PropertyDescriptor) => {
        const original: unknown = descriptor.value;
        if (typeof original !== 'function') return;
        descriptor.value = function (this: unknown, ...args: Args) {
            const metadata = fn?.(...args);
            return tracer.startActiveSpan(module, propertyKey, { ...metadata }, () => original.apply(this, args));
        };
    };

import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Caller-owned slot the engine fills with a decoded body.
 *
 * A sink built with {@link ModelSink.of} validates the decoded value against its
 * schema; a validation failure is reported as a decode failure.
 *
 * @example
 * ```typescript
 * const user = ModelSink.of(z.object({ id: z.number(), name: z.string() }));
 * await engine.request({ method: 'GET', url: '/users/1', responseModel: user });
 * console.log(user.value?.name);
 * ```
 */
export class ModelSink<T> {
  private current: T | undefined;
  private isFilled = false;

  private constructor(private readonly parse: (data: unknown) => T) {}

  static of<T>(schema: ZodType<T, ZodTypeDef, unknown>): ModelSink<T> {
    return new ModelSink((data) => schema.parse(data));
  }

  static untyped(): ModelSink<unknown> {
    return new ModelSink((data) => data);
  }

  get value(): T | undefined {
    return this.current;
  }

  get filled(): boolean {
    return this.isFilled;
  }

  fill(data: unknown): T {
    const parsed = this.parse(data);
    this.current = parsed;
    this.isFilled = true;
    return parsed;
  }

  clear(): void {
    this.current = undefined;
    this.isFilled = false;
  }
}

import { idOf, isToken, type EntryKey } from '../core/token.js';
import { ClassRegistry } from '../registry/class-registry.js';
import type { Constructor } from '../types/types.js';

/**
 * Parameter decorator for constructor dependency injection.
 *
 * Declares which entry is injected into the parameter when the class is
 * autowired. TypeScript's emitDecoratorMetadata is not used: every
 * autowired parameter needs an explicit @Inject() or an explicit argument in
 * its definition.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class UserService {
 *   constructor(
 *     @Inject('database') private db: Database,
 *     @Inject(LoggerT) private logger: Logger
 *   ) {}
 * }
 * ```
 */
export function Inject<T>(key: EntryKey<T>): ParameterDecorator {
  return function (
    target: object,
    propertyKey: string | symbol | undefined,
    parameterIndex: number
  ) {
    if (typeof key !== 'string' && !isToken(key)) {
      throw new Error("@Inject expects an entry id or a token, e.g. @Inject('logger')");
    }
    if (propertyKey !== undefined) {
      throw new Error(
        `@Inject can only decorate constructor parameters, not ${String(propertyKey)}()`
      );
    }

    // Target is the constructor function for constructor parameter decorators.
    const constructor = target as unknown as Constructor;
    ClassRegistry.registerInject(constructor, parameterIndex, idOf(key));
  };
}

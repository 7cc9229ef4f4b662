import { ClassRegistry } from '../registry/class-registry.js';
import type { Constructor, InjectableOptions } from '../types/types.js';

/**
 * Marks a class as injectable.
 *
 * Registers the class in the {@link ClassRegistry} at module load time under
 * its name, so that it can be autowired by name and referenced from compiled
 * containers. Constructor parameters are declared with @Inject().
 *
 * @param options.name - Registered name (defaults to the class name)
 *
 * @example
 * ```typescript
 * @Injectable({ name: 'billing.InvoiceMailer' })
 * class InvoiceMailer {
 *   constructor(@Inject('mailer.transport') private transport: Transport) {}
 * }
 * ```
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  return (target) => {
    const constructor = target as unknown as Constructor;
    ClassRegistry.register(constructor, options.name);
  };
}

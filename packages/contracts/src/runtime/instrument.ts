/**
 * Attaching declared contracts to a class.
 *
 * ```typescript
 * class Solver {
 *   state = "NotReady";
 *   initialize(): void { ... }
 *   compute(input: number[]): boolean { ... }
 *   get answer(): number { ... }
 * }
 *
 * const CheckedSolver = instrument(Solver);
 * const solver = new CheckedSolver();
 * solver.answer; // PreconditionViolation: this.state === "Computed"
 * ```
 *
 * Declared methods and getters, own or inherited, are wrapped on the
 * class's prototype; the returned constructor checks constructor clauses
 * and the invariants of every new instance.
 */

import type { ContractRegistry } from "../declarations/registry.js";
import { globalContracts } from "../declarations/registry.js";
import { ContractDeclarationError } from "./errors.js";
import { RuntimeVerifier } from "./verifier.js";

export interface InstrumentOptions {
  /** Registry holding the type's contract (default: globalContracts) */
  registry?: ContractRegistry;
  /** Verifier to check with (default: a new verifier over `registry`) */
  verifier?: RuntimeVerifier;
  /** Declared type name (default: the class name) */
  type?: string;
}

const instrumented = new WeakSet<object>();

export function instrument<C extends new (...args: never[]) => object>(
  ctor: C,
  options: InstrumentOptions = {}
): C {
  const registry = options.verifier?.registry ?? options.registry ?? globalContracts;
  const verifier = options.verifier ?? new RuntimeVerifier(registry);
  const type = options.type ?? ctor.name;

  const contract = registry.typeContract(type);
  if (!contract) {
    throw new ContractDeclarationError(`Cannot instrument ${ctor.name}: type ${type} is not declared`);
  }

  const prototype: object = ctor.prototype;
  if (instrumented.has(prototype)) {
    throw new ContractDeclarationError(`${ctor.name} is already instrumented`);
  }

  for (const operation of contract.operations.values()) {
    if (operation.kind === "constructor") continue;

    const name = operation.name;
    const ref = { type, operation: name };
    const descriptor = findDescriptor(prototype, name);
    if (!descriptor) {
      throw new ContractDeclarationError(`${type}.${name} is declared but ${ctor.name} has no such member`);
    }

    if (operation.kind === "getter") {
      const getter = descriptor.get;
      if (!getter) throw new ContractDeclarationError(`${type}.${name} is declared as a getter`);
      Object.defineProperty(prototype, name, {
        ...descriptor,
        get(this: unknown): unknown {
          return verifier.call(ref, this, [], (): unknown => Reflect.apply(getter, this, []));
        },
      });
      continue;
    }

    const method: unknown = descriptor.value;
    if (typeof method !== "function") {
      throw new ContractDeclarationError(`${type}.${name} is declared as a method`);
    }
    Object.defineProperty(prototype, name, {
      ...descriptor,
      value: function (this: unknown, ...args: unknown[]): unknown {
        return verifier.call(ref, this, args, (): unknown => Reflect.apply(method, this, args));
      },
    });
  }

  instrumented.add(prototype);

  return new Proxy(ctor, {
    construct(target, args, newTarget): object {
      const instancePrototype: unknown = newTarget.prototype;
      return verifier.construct(
        type,
        args,
        (): object => Reflect.construct(target, args, newTarget),
        typeof instancePrototype === "object" && instancePrototype !== null ? instancePrototype : undefined
      );
    },
  });
}

/** Own or inherited property descriptor, stopping before Object.prototype. */
function findDescriptor(prototype: object, name: string): PropertyDescriptor | undefined {
  for (
    let current: object | null = prototype;
    current !== null && current !== Object.prototype;
    current = Object.getPrototypeOf(current)
  ) {
    const descriptor = Object.getOwnPropertyDescriptor(current, name);
    if (descriptor) return descriptor;
  }
  return undefined;
}

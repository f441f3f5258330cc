import type { DeclaredType } from '../../types/global';
import type { DecodePlan } from './plan';

function isPlanFor<T>(
  plan: DecodePlan<unknown> | undefined,
  type: DeclaredType<T>
): plan is DecodePlan<T> {
  return plan?.type === type;
}

/**
 * A lookup of {@link DecodePlan}s by declared type. Registries are plain
 * objects passed through options; there is no global registry.
 */
export class DecoderRegistry {
  protected readonly plans = new Map<DeclaredType<unknown>, DecodePlan<unknown>>();

  /**
   * Files `plan` under its own declared type, replacing any plan registered
   * for that type before.
   */
  register<T>(plan: DecodePlan<T>): this {
    this.plans.set(plan.type, plan);
    return this;
  }

  lookup<T>(type: DeclaredType<T>): DecodePlan<T> | undefined {
    const plan = this.plans.get(type);
    return isPlanFor(plan, type) ? plan : undefined;
  }

  has(type: DeclaredType<unknown>) {
    return this.plans.has(type);
  }
}

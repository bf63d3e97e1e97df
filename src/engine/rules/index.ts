/**
 * Rule registry: builds rule instances from serializable descriptors.
 */
import type { RuleDescriptor, RuleKind } from '../../data/types';
import { ConfigurationError } from '../errors';
import type { Rule } from './Rule';
import { Accelerate } from './Accelerate';
import { Dawdling } from './Dawdling';
import { AvoidCollision } from './AvoidCollision';
import { BreakOrTakeOver } from './BreakOrTakeOver';
import { MoveForward } from './MoveForward';
import { MergeBack } from './MergeBack';
import { DummyShuffle } from './DummyShuffle';

export type { Rule } from './Rule';
export { Accelerate, Dawdling, AvoidCollision, BreakOrTakeOver, MoveForward, MergeBack, DummyShuffle };

export const RULE_KINDS: readonly RuleKind[] = [
  'accelerate',
  'dawdling',
  'avoid-collision',
  'break-or-take-over',
  'move-forward',
  'merge-back',
  'dummy-shuffle',
];

export function isRuleKind(value: string): value is RuleKind {
  return RULE_KINDS.some((kind) => kind === value);
}

function requireParam(descriptor: RuleDescriptor, name: string): number {
  const value = descriptor.params[name];
  if (typeof value !== 'number') {
    throw new ConfigurationError(`${descriptor.kind}: missing numeric param "${name}"`);
  }
  return value;
}

/**
 * Build a fresh rule from its descriptor.
 *
 * @throws ConfigurationError for an unknown kind or invalid params
 */
export function createRule(descriptor: RuleDescriptor): Rule {
  switch (descriptor.kind) {
    case 'accelerate':
      return new Accelerate(requireParam(descriptor, 'vMax'));
    case 'dawdling':
      return new Dawdling(requireParam(descriptor, 'probability'), requireParam(descriptor, 'seed'));
    case 'avoid-collision':
      return new AvoidCollision();
    case 'break-or-take-over':
      return new BreakOrTakeOver();
    case 'move-forward':
      return new MoveForward();
    case 'merge-back':
      return new MergeBack();
    case 'dummy-shuffle':
      return new DummyShuffle(descriptor.params.shift ?? 1);
    default: {
      const unknown: never = descriptor.kind;
      throw new ConfigurationError(`unknown rule kind "${String(unknown)}"`);
    }
  }
}

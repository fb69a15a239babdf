import { withOrigin } from '../utils/errors.js';
import type { BuildStep } from './node.js';
import { EMPTY_NAMESPACE, expand, expandToSequence, PathToken, tokenText, type CommandToken } from './subst.js';

/**
 * Command template of a step: its inline command, or a reference to the
 * tool variable holding one.
 */
export function stepTemplate(step: BuildStep): string | readonly CommandToken[] {
  return step.command ?? `$${step.tool}.${step.commandVar ?? 'cmd'}`;
}

/**
 * The step's command as tokens, expanded against its environment. Executor
 * variables (`$in`, `$out`, per-step variables) are left in place.
 */
export function expandStepCommand(step: BuildStep): CommandToken[] {
  const template = stepTemplate(step);
  try {
    return step.environment ? step.environment.substToSequence(template) : expandToSequence(template, EMPTY_NAMESPACE);
  } catch (error) {
    throw withOrigin(error, step.origin);
  }
}

/**
 * Expand a description or depfile template of a step.
 */
export function expandStepText(step: BuildStep, template: string | undefined): string | undefined {
  if (template === undefined) return undefined;
  try {
    return step.environment ? step.environment.subst(template) : expand(template, EMPTY_NAMESPACE);
  } catch (error) {
    throw withOrigin(error, step.origin);
  }
}

const VARIABLE_REFERENCE = /\$\$|\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;
const WHOLE_VARIABLE = /^\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))$/;

function bindText(text: string, bindings: ReadonlyMap<string, readonly CommandToken[]>): string {
  return text.replace(VARIABLE_REFERENCE, (match: string, braced: string | undefined, bare: string | undefined) => {
    if (match === '$$') return '$';
    const name = braced ?? bare ?? '';
    return (bindings.get(name) ?? []).map(tokenText).join(' ');
  });
}

/**
 * Substitute executor variables the way the executor would, for consumers
 * that need the final command line. A token that is exactly one variable
 * becomes that variable's tokens; unknown variables are empty.
 */
export function bindStepVariables(
  tokens: readonly CommandToken[],
  bindings: ReadonlyMap<string, readonly CommandToken[]>
): CommandToken[] {
  return tokens.flatMap(token => {
    if (token instanceof PathToken) {
      return [new PathToken(token.path, bindText(token.prefix, bindings), bindText(token.suffix, bindings))];
    }
    const whole = WHOLE_VARIABLE.exec(token);
    if (whole) {
      return [...(bindings.get(whole[1] ?? whole[2]) ?? [])];
    }
    return [bindText(token, bindings)];
  });
}

/**
 * Variables the executor provides for a step: `in`, `out` and the step's own.
 */
export function stepBindings(step: BuildStep): Map<string, CommandToken[]> {
  const bindings = new Map<string, CommandToken[]>();
  bindings.set('in', step.sources.map(node => new PathToken(node.identity)));
  bindings.set('out', step.outputs.map(node => new PathToken(node.identity)));
  for (const [name, tokens] of step.variables) {
    bindings.set(name, tokens);
  }
  return bindings;
}

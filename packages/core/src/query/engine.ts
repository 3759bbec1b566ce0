import { Environment } from "@marcbachmann/cel-js";
import { EvaluationError } from "../errors.js";
import type { Run } from "../model/run.js";
import type { FactValue } from "../model/value.js";
import { isFactObject, setOwn } from "../model/value.js";
import type { Binding, Declaration } from "./declarations.js";
import { declarationSignature, inferDeclarations } from "./declarations.js";

type CelValue = boolean | number | bigint | string | null | CelValue[] | { [key: string]: CelValue };

/** A run's facts plus `run_id` and `test_name`, which take precedence. */
export function buildBinding(run: Run): Binding {
  return {
    ...run.factValues(),
    run_id: run.runId,
    test_name: run.testName,
  };
}

function toCelValue(value: FactValue): CelValue {
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  if (Array.isArray(value)) return value.map(toCelValue);
  if (isFactObject(value)) {
    const out: { [key: string]: CelValue } = {};
    for (const [key, item] of Object.entries(value)) setOwn(out, key, toCelValue(item));
    return out;
  }
  return value;
}

function toActivation(binding: Binding, declarations: Declaration[]): Record<string, CelValue> {
  const activation: Record<string, CelValue> = {};
  for (const { name } of declarations) setOwn(activation, name, toCelValue(binding[name]));
  return activation;
}

function describeResult(result: unknown): string {
  if (result === null) return "null";
  if (typeof result === "bigint") return "an int";
  if (typeof result === "number") return "a double";
  if (Array.isArray(result)) return "a list";
  return typeof result === "object" ? "a map" : `a ${typeof result}`;
}

function reasonOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Evaluates one CEL expression against run bindings.
 *
 * Bindings are typed per run, so one environment is kept for each distinct
 * set of declarations seen.
 */
export class PredicateEngine {
  readonly expression: string;
  private readonly environments = new Map<string, Environment>();

  constructor(expression: string) {
    if (expression.trim() === "") {
      throw new EvaluationError(expression, "expression is empty");
    }
    this.expression = expression;
  }

  evaluate(binding: Binding): boolean {
    const declarations = inferDeclarations(binding);
    const environment = this.environmentFor(declarations);

    let result: unknown;
    try {
      const check = environment.check(this.expression);
      if (!check.valid) {
        throw new EvaluationError(this.expression, reasonOf(check.error ?? "type check failed"), {
          cause: check.error,
        });
      }
      result = environment.evaluate(this.expression, toActivation(binding, declarations));
    } catch (e) {
      if (e instanceof EvaluationError) throw e;
      throw new EvaluationError(this.expression, reasonOf(e), { cause: e });
    }

    if (typeof result !== "boolean") {
      throw new EvaluationError(this.expression, `evaluated to ${describeResult(result)}, expected a bool`);
    }
    return result;
  }

  private environmentFor(declarations: Declaration[]): Environment {
    const signature = declarationSignature(declarations);
    const cached = this.environments.get(signature);
    if (cached) return cached;

    const environment = new Environment();
    for (const { name, type } of declarations) environment.registerVariable(name, type);
    this.environments.set(signature, environment);
    return environment;
  }
}

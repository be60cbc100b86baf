import { ParseError, type PackingInstance, type SolutionEvaluation } from '@packbench/shared';
import { parseNumber } from '../cases/baseline';
import { PLACEMENT_MARKER, evaluateSolution } from './solution';

export interface ParsedOutput {
  objective: number | null;
  /** `null` when the output carries no feasibility signal */
  feasible: boolean | null;
  evaluation?: SolutionEvaluation;
  /** Why the run is infeasible, when known */
  reason?: string;
}

const RESULT_LINE = /^objective\s*[:=]\s*(\S+)(?:\s+(feasible|infeasible))?$/i;
const INFEASIBLE_LINE = /^infeasible$/i;

/**
 * Extracts the objective and feasibility from solver output.
 *
 * A result line reads `objective: <number> [feasible|infeasible]` (or `=`), case
 * insensitive; the last one wins and every other line is noise. Without one, a
 * solution-format output (`placement of rectangles` followed by placements) is
 * evaluated against `instance`.
 *
 * @throws ParseError when the output carries nothing recognisable
 */
export function parseSolverOutput(stdout: string, instance?: PackingInstance): ParsedOutput {
  let objective: number | null = null;
  let marker: boolean | null = null;
  let sawResult = false;
  let sawInfeasible = false;

  for (const raw of stdout.split(/\r?\n/)) {
    const line = raw.trim();
    if (INFEASIBLE_LINE.test(line)) {
      sawInfeasible = true;
      continue;
    }
    const match = RESULT_LINE.exec(line);
    if (!match) continue;
    const value = parseNumber(match[1]);
    if (value === null) continue;

    sawResult = true;
    objective = value;
    marker = match[2] ? match[2].toLowerCase() === 'feasible' : null;
  }

  // A standalone `infeasible` line overrides any marker.
  if (sawInfeasible) {
    return { objective, feasible: false };
  }
  if (sawResult) {
    return { objective, feasible: marker };
  }

  if (instance && stdout.includes(PLACEMENT_MARKER)) {
    const solution = evaluateSolution(stdout, instance);
    return solution.feasible
      ? { objective: solution.objective, feasible: true, evaluation: solution.evaluation }
      : { objective: null, feasible: false, reason: solution.reason };
  }

  throw new ParseError('Solver output contains no result line');
}

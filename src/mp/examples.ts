/**
 * Small programs with known optima, used to check engines end to end.
 */

import { Constraint, Objective, SumTerms, Variable } from "../model";
import { MPBuilder } from "./mp-builder";

/**
 * max 143x + 60y subject to
 *   c1: 120x + 210y ≤ 15000
 *   c2: 110x + 30y ≤ 4000
 *   c3: x + y ≤ 75
 * with x, y integer. Optimum x = 22, y = 52, value 6266.
 */
export function oneFourThree(): MPBuilder {
  const mp = new MPBuilder({ name: "OneFourThree" });
  const x = Variable.integer("x");
  const y = Variable.integer("y");
  mp.addVariable(x);
  mp.addVariable(y);
  mp.setObjective(Objective.max(SumTerms.of(143, x, 60, y)));
  mp.add(Constraint.of("c1", SumTerms.of(120, x, 210, y), "LE", 15000));
  mp.add(Constraint.of("c2", SumTerms.of(110, x, 30, y), "LE", 4000));
  mp.add(Constraint.of("c3", SumTerms.of(1, x, 1, y), "LE", 75));
  return mp;
}

/** {@link oneFourThree} with `low x: x ≤ 16`. Optimum x = 16, y = 59, value 5828. */
export function oneFourThreeLowX(): MPBuilder {
  const mp = oneFourThree();
  const x = mp.getVariable("x");
  mp.add(Constraint.of("low x", SumTerms.of(1, x), "LE", 16));
  return mp;
}

/**
 * Model registry, options and solution loading
 */

import { beforeEach, describe, expect, it } from "vitest";

import {
  InvalidOptionsError,
  MemorySolver,
  Model,
  ModelMismatchError,
  ObjectiveSense,
  OptimizationStatus,
  Var,
  VarType,
} from "../src";

describe("Model", () => {
  describe("options", () => {
    it("defaults to an unnamed minimization", () => {
      const model = Model.create();
      expect(model.name).toBe("");
      expect(model.sense).toBe(ObjectiveSense.Minimize);
      expect(model.status).toBe(OptimizationStatus.Loaded);
    });

    it("takes a name and a sense", () => {
      const model = Model.create({ name: "knapsack", sense: ObjectiveSense.Maximize });
      expect(model.name).toBe("knapsack");
      expect(model.sense).toBe(ObjectiveSense.Maximize);
    });

    it("rejects malformed options", () => {
      expect(() => Reflect.apply(Model.create, Model, [{ name: 5 }])).toThrow(InvalidOptionsError);
    });

    it("rejects an unknown sense", () => {
      const model = Model.create();
      expect(() => Reflect.set(model, "sense", "UP")).toThrow(InvalidOptionsError);
      expect(model.sense).toBe(ObjectiveSense.Minimize);
    });

    it("accepts any solver factory", () => {
      const model = new Model((m) => new MemorySolver(m), { name: "custom" });
      const x = model.addVar({ name: "x" });
      expect(model.solver).toBeInstanceOf(MemorySolver);
      expect(x.model).toBe(model);
    });
  });

  describe("variables", () => {
    it("rejects a lower bound above the upper bound", () => {
      const model = Model.create();
      let error: unknown;
      try {
        model.addVar({ name: "x", lb: 5, ub: 1 });
      } catch (err) {
        error = err;
      }
      expect(error).toBeInstanceOf(InvalidOptionsError);
      expect(error).toMatchObject({
        code: "INVALID_OPTIONS",
        message: "invalid variable options: lb: lower bound must not exceed upper bound",
        issues: ["lb: lower bound must not exceed upper bound"],
      });
      expect(model.numCols).toBe(0);
    });

    it("rejects binary bounds that cross once clipped to [0, 1]", () => {
      const model = Model.create();
      let error: unknown;
      try {
        model.addVar({ name: "b", lb: 3, varType: VarType.Binary });
      } catch (err) {
        error = err;
      }
      expect(error).toBeInstanceOf(InvalidOptionsError);
      expect(error).toMatchObject({
        message: "invalid variable options: lb: lower bound must not exceed upper bound",
      });
      expect(model.numCols).toBe(0);
    });

        it("rejects a non-finite objective coefficient", () => {
      const model = Model.create();
      expect(() => model.addVar({ obj: Infinity })).toThrow(InvalidOptionsError);
    });

    it("rejects an unknown variable type", () => {
      const model = Model.create();
      expect(() => Reflect.apply(model.addVar, model, [{ varType: "Q" }])).toThrow(InvalidOptionsError);
    });

    it("indexes variables in creation order", () => {
      const model = Model.create();
      const vars = ["a", "b", "c"].map((name) => model.addVar({ name }));
      expect(vars.map((v) => v.idx)).toEqual([0, 1, 2]);
      expect(model.vars).toEqual(vars);
      expect(model.numCols).toBe(3);
      expect(model.varByName("b")).toBe(vars[1]);
      expect(model.varByName("z")).toBeUndefined();
    });
  });

  describe("objective", () => {
    let model: Model<MemorySolver>;
    let x: Var;
    let y: Var;

    beforeEach(() => {
      model = Model.create({ sense: ObjectiveSense.Maximize });
      x = model.addVar({ name: "x", obj: 1 });
      y = model.addVar({ name: "y", varType: VarType.Integer });
    });

    it("collects the objective coefficients of the variables", () => {
      expect(model.objective.coefficient(x)).toBe(1);
      expect(model.objective.has(y)).toBe(false);
    });

    it("replaces the objective with an expression", () => {
      model.objective = x.multiply(2).plus(y).plus(4);
      expect(x.obj).toBe(2);
      expect(y.obj).toBe(1);
      expect(model.objective.const).toBe(4);
      expect(model.objective.sense).toBe("");
    });

    it("drops the sense of an assigned constraint", () => {
      model.objective = x.le(3);
      expect(model.objective.sense).toBe("");
      expect(model.objective.const).toBe(-3);
      expect(model.objective.coefficient(x)).toBe(1);
    });

    it("accepts a variable or a number", () => {
      model.objective = y;
      expect(model.objective.coefficient(y)).toBe(1);
      expect(x.obj).toBe(0);

      model.objective = 7;
      expect(model.objective.isConstant()).toBe(true);
      expect(model.objective.const).toBe(7);
    });

    it("refuses variables of another model", () => {
      const other = Model.create();
      const z = other.addVar({ name: "z" });
      expect(() => {
        model.objective = z;
      }).toThrow(ModelMismatchError);
    });

    it("renders the objective", () => {
      model.objective = x.multiply(2).minus(y).plus(4);
      expect(model.objective.toString()).toBe("+ 2 x - y + 4");
    });
  });

  describe("solutions", () => {
    let model: Model<MemorySolver>;
    let x: Var;
    let y: Var;

    beforeEach(() => {
      model = Model.create();
      x = model.addVar({ name: "x" });
      y = model.addVar({ name: "y" });
      model.objective = x.multiply(2).plus(y).plus(4);
      model.addConstr(x.plus(y).le(10), "cap");
    });

    it("has no solution at first", () => {
      expect(model.numSolutions).toBe(0);
      expect(model.objectiveValue).toBeUndefined();
    });

    it("evaluates the objective at the loaded solution", () => {
      model.solver.loadSolution({ status: OptimizationStatus.Optimal, x: [1, 3] });
      expect(model.status).toBe(OptimizationStatus.Optimal);
      expect(model.numSolutions).toBe(1);
      expect(model.objectiveValue).toBe(9);
    });

    it("prefers the objective value reported by the solver", () => {
      model.solver.loadSolution({ status: OptimizationStatus.Feasible, x: [1, 3], objectiveValue: 42 });
      expect(model.objectiveValue).toBe(42);
    });

    it("counts pool solutions", () => {
      model.solver.loadSolution({
        status: OptimizationStatus.Optimal,
        x: [1, 3],
        pool: [[1, 3], [2, 0], [0, 0]],
      });
      expect(model.numSolutions).toBe(3);
    });

    it("keeps no values for statuses without a solution", () => {
      model.solver.loadSolution({ status: OptimizationStatus.Infeasible, x: [1, 3] });
      expect(model.status).toBe(OptimizationStatus.Infeasible);
      expect(x.x).toBeUndefined();
      expect(model.numSolutions).toBe(0);
    });

    it("rejects values that do not match the model", () => {
      let error: unknown;
      try {
        model.solver.loadSolution({ status: OptimizationStatus.Optimal, x: [1], pi: [0, 0] });
      } catch (err) {
        error = err;
      }
      expect(error).toBeInstanceOf(InvalidOptionsError);
      expect(error).toMatchObject({
        issues: ["x: expected 2 values, got 1", "pi: expected 1 values, got 2"],
      });
      expect(model.status).toBe(OptimizationStatus.Error);
      expect(y.x).toBeUndefined();
    });

    it("rejects malformed solution data", () => {
      expect(() => Reflect.apply(model.solver.loadSolution, model.solver, [{ status: "done" }]))
        .toThrow(InvalidOptionsError);
    });

    it("clears the solution on request", () => {
      model.solver.loadSolution({ status: OptimizationStatus.Optimal, x: [1, 3] });
      model.solver.clearSolution();
      expect(model.status).toBe(OptimizationStatus.Loaded);
      expect(x.x).toBeUndefined();
    });

    it("clears the solution when the objective changes", () => {
      model.solver.loadSolution({ status: OptimizationStatus.Optimal, x: [1, 3] });
      model.objective = y;
      expect(model.objectiveValue).toBeUndefined();
    });
  });

  describe("counters", () => {
    it("counts rows and non-zeros", () => {
      const model = Model.create();
      const x = model.addVar({ name: "x" });
      const y = model.addVar({ name: "y" });
      model.addConstr(x.plus(y).le(4));
      model.addConstr(x.ge(1));
      expect(model.numRows).toBe(2);
      expect(model.numNz).toBe(3);
      expect(model.constrs.map((c) => c.name)).toEqual(["constr(0)", "constr(1)"]);
    });
  });
});

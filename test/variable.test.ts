/**
 * Variable handles
 *
 * Every attribute of a variable is read from and written to the
 * model's solver, keyed by the variable's index.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  InvalidOptionsError,
  InvalidVariableTypeError,
  MemorySolver,
  Model,
  OptimizationStatus,
  Var,
  VarType,
} from "../src";

describe("Var", () => {
  let model: Model<MemorySolver>;
  let x: Var;
  let y: Var;

  beforeEach(() => {
    model = Model.create();
    x = model.addVar({ name: "x" });
    y = model.addVar({ name: "y", lb: -2, ub: 8, obj: 3, varType: VarType.Integer });
  });

  describe("attributes", () => {
    it("has continuous non-negative defaults", () => {
      expect(x.lb).toBe(0);
      expect(x.ub).toBe(Infinity);
      expect(x.obj).toBe(0);
      expect(x.varType).toBe(VarType.Continuous);
    });

    it("reads the options it was created with", () => {
      expect(y.lb).toBe(-2);
      expect(y.ub).toBe(8);
      expect(y.obj).toBe(3);
      expect(y.varType).toBe(VarType.Integer);
    });

    it("writes bounds and objective coefficient through the solver", () => {
      const setLb = vi.spyOn(model.solver, "varSetLb");
      x.lb = -5;
      x.ub = 10;
      x.obj = 2.5;
      expect(setLb).toHaveBeenCalledWith(x, -5);
      expect(x.lb).toBe(-5);
      expect(x.ub).toBe(10);
      expect(x.obj).toBe(2.5);
      expect(model.objective.coefficient(x)).toBe(2.5);
    });

    it("clips binary bounds to [0, 1]", () => {
      const b = model.addVar({ name: "b", lb: -3, ub: 7, varType: VarType.Binary });
      expect(b.lb).toBe(0);
      expect(b.ub).toBe(1);

      x.lb = -5;
      x.ub = 10;
      x.varType = VarType.Binary;
      expect(x.varType).toBe(VarType.Binary);
      expect(x.lb).toBe(0);
      expect(x.ub).toBe(1);
    });

    it("rejects a lower bound above the upper bound", () => {
      const setLb = vi.spyOn(model.solver, "varSetLb");
      let error: unknown;
      try {
        y.lb = 10;
      } catch (err) {
        error = err;
      }
      expect(error).toBeInstanceOf(InvalidOptionsError);
      expect(error).toMatchObject({
        message: "invalid lower bound: lb: lower bound must not exceed upper bound",
        issues: ["lb: lower bound must not exceed upper bound"],
      });
      expect(setLb).not.toHaveBeenCalled();
      expect(y.lb).toBe(-2);
    });

    it("rejects an upper bound below the lower bound", () => {
      expect(() => {
        y.ub = -4;
      }).toThrow(InvalidOptionsError);
      expect(y.ub).toBe(8);
    });

    it("rejects NaN bounds and non-finite objective coefficients", () => {
      expect(() => {
        x.lb = NaN;
      }).toThrow(InvalidOptionsError);
      expect(() => {
        x.ub = NaN;
      }).toThrow(InvalidOptionsError);
      expect(() => {
        x.obj = NaN;
      }).toThrow(InvalidOptionsError);
      expect(() => {
        x.obj = Infinity;
      }).toThrow(InvalidOptionsError);
      expect(x.lb).toBe(0);
      expect(x.ub).toBe(Infinity);
      expect(x.obj).toBe(0);
    });

    it("accepts infinite bounds", () => {
      x.lb = -Infinity;
      expect(x.lb).toBe(-Infinity);
    });

    it("refuses to make a variable binary when its bounds miss [0, 1]", () => {
      y.lb = 5;
      expect(() => {
        y.varType = VarType.Binary;
      }).toThrow(InvalidOptionsError);
      expect(y.varType).toBe(VarType.Integer);
      expect(y.lb).toBe(5);
      expect(y.ub).toBe(8);
    });

    it("rejects an unknown type before reaching the solver", () => {
      const setType = vi.spyOn(model.solver, "varSetVarType");
      expect(() => Reflect.set(x, "varType", "Q")).toThrow(InvalidVariableTypeError);
      expect(setType).not.toHaveBeenCalled();
      expect(x.varType).toBe(VarType.Continuous);
    });
  });

  describe("names", () => {
    it("names unnamed variables by index", () => {
      const v = model.addVar();
      expect(v.name).toBe("var(2)");
      expect(v.toString()).toBe("var(2)");
    });

    it("makes duplicate names unique", () => {
      const again = model.addVar({ name: "x" });
      expect(again.name).toBe("x_1");
      expect(model.varByName("x")).toBe(x);
      expect(model.varByName("x_1")).toBe(again);
    });

    it("makes a rename to a name in use unique", () => {
      y.name = "x";
      expect(y.name).toBe("x_1");
      expect(x.name).toBe("x");
      expect(model.varByName("x")).toBe(x);
      expect(model.varByName("x_1")).toBe(y);
      expect(model.varByName("y")).toBeUndefined();
    });

    it("keeps its name when renamed to itself", () => {
      x.name = "x";
      expect(x.name).toBe("x");
      expect(model.varByName("x")).toBe(x);
    });

    it("renames", () => {
      x.name = "alpha";
      expect(x.name).toBe("alpha");
      expect(model.varByName("alpha")).toBe(x);
      expect(model.varByName("x")).toBeUndefined();
    });
  });

  describe("identity", () => {
    it("compares by model and index", () => {
      expect(new Var(model, 0).is(x)).toBe(true);
      expect(x.is(y)).toBe(false);
      expect(new Var(Model.create(), 0).is(x)).toBe(false);
    });

    it("sorts by index", () => {
      expect([y, x].sort(Var.Compare)).toEqual([x, y]);
    });

    it("is the handle stored in the model", () => {
      expect(model.vars[0]).toBe(x);
      expect(model.vars[1]).toBe(y);
    });
  });

  describe("solution values", () => {
    it("has no value before a solution is loaded", () => {
      expect(x.x).toBeUndefined();
      expect(x.rc).toBeUndefined();
    });

    it("reads the value of the loaded solution", () => {
      model.solver.loadSolution({ status: OptimizationStatus.Optimal, x: [1.5, 2] });
      expect(x.x).toBe(1.5);
      expect(y.x).toBe(2);
    });

    it("reads pool solutions while the status is optimal or feasible", () => {
      model.solver.loadSolution({
        status: OptimizationStatus.Feasible,
        x: [1, 2],
        pool: [[1, 2], [0, 3]],
      });
      expect(x.xi(0)).toBe(1);
      expect(x.xi(1)).toBe(0);
      expect(y.xi(1)).toBe(3);
      expect(x.xi(2)).toBeUndefined();
    });

    it("treats the loaded solution as pool entry zero without a pool", () => {
      model.solver.loadSolution({ status: OptimizationStatus.Optimal, x: [4, 5] });
      expect(y.xi(0)).toBe(5);
      expect(y.xi(1)).toBeUndefined();
    });

    it("does not ask the solver for pool values without a solution", () => {
      model.solver.loadSolution({ status: OptimizationStatus.NoSolutionFound });
      const getXi = vi.spyOn(model.solver, "varGetXi");
      expect(x.xi(0)).toBeUndefined();
      expect(getXi).not.toHaveBeenCalled();
    });

    it("reports reduced costs only for linear programs", () => {
      y.varType = VarType.Continuous;
      model.solver.loadSolution({ status: OptimizationStatus.Optimal, x: [0, 1], rc: [0.5, 0] });
      expect(x.rc).toBe(0.5);

      y.varType = VarType.Integer;
      model.solver.loadSolution({ status: OptimizationStatus.Optimal, x: [0, 1], rc: [0.5, 0] });
      expect(x.rc).toBeUndefined();
    });

    it("forgets the solution when the model changes", () => {
      model.solver.loadSolution({ status: OptimizationStatus.Optimal, x: [1.5, 2] });
      x.ub = 1;
      expect(x.x).toBeUndefined();
      expect(model.status).toBe(OptimizationStatus.Loaded);
    });
  });

  describe("arithmetic", () => {
    it("adds and subtracts", () => {
      const e = x.plus(y).minus(3);
      expect(e.coefficient(x)).toBe(1);
      expect(e.coefficient(y)).toBe(1);
      expect(e.const).toBe(-3);
    });

    it("subtracts itself to nothing", () => {
      expect(x.minus(x).isConstant()).toBe(true);
    });

    it("multiplies, divides and negates", () => {
      expect(x.multiply(4).coefficient(x)).toBe(4);
      expect(x.divide(4).coefficient(x)).toBe(0.25);
      expect(x.neg().coefficient(x)).toBe(-1);
    });

    it("builds constraints against numbers", () => {
      const e = x.le(4);
      expect(e.sense).toBe("<");
      expect(e.coefficient(x)).toBe(1);
      expect(e.const).toBe(-4);
      expect(x.eq(0).const).toBe(0);
      expect(x.ge(-1).const).toBe(1);
    });
  });
});

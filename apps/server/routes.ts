import type { Express, Response } from "express";
import { createServer, type Server } from "http";
import { storage as defaultStorage, type IStorage } from "./storage";
import {
  calculateRequestSchema,
  configurationPatchSchema,
  densityInputSchema,
  explanationQuerySchema,
  fixedCostInputSchema,
  numericInputSchema,
  packSettingSchema,
} from "@shared/schema";
import {
  DEFAULT_EXPORT_FILENAME,
  RESULT_COLUMNS,
  formatColumnExplanation,
  isResultColumnId,
  type ValidationError,
} from "@minwool/engine";

const XLSX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

function statusFor(errors: ValidationError[]): number {
  const codes = errors.map((e) => e.code);
  if (codes.includes("ERR_CALCULATION_FAILED")) return 500;
  if (
    codes.includes("ERR_UNKNOWN_DENSITY") ||
    codes.includes("ERR_UNKNOWN_CATEGORY") ||
    codes.includes("ERR_NO_RESULTS")
  ) {
    return 404;
  }
  return 400;
}

function sendErrors(res: Response, errors: ValidationError[]) {
  return res.status(statusFor(errors)).json({
    error: errors[0]?.message ?? "Request failed",
    details: errors,
  });
}

export async function registerRoutes(app: Express, storage: IStorage = defaultStorage): Promise<Server> {
  // ============================================================================
  // SESSION STATE
  // ============================================================================

  app.get("/api/state", async (_req, res) => {
    try {
      const calculator = await storage.getCalculator();
      res.json(calculator.getState());
    } catch (error) {
      console.error("[calculator] Failed to read state:", error);
      res.status(500).json({ error: "Failed to read calculator state" });
    }
  });

  app.post("/api/reset", async (_req, res) => {
    try {
      const calculator = await storage.resetCalculator();
      console.log("[calculator] Session reset to defaults");
      res.json(calculator.getState());
    } catch (error) {
      console.error("[calculator] Failed to reset session:", error);
      res.status(500).json({ error: "Failed to reset calculator" });
    }
  });

  app.put("/api/config", async (req, res) => {
    try {
      const parsed = configurationPatchSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
      }

      const calculator = await storage.getCalculator();
      const result = calculator.updateConfiguration(parsed.data);
      if (!result.success) return sendErrors(res, result.errors);

      res.json(result.data);
    } catch (error) {
      console.error("[calculator] Failed to update configuration:", error);
      res.status(500).json({ error: "Failed to update configuration" });
    }
  });

  // ============================================================================
  // FIXED COSTS
  // ============================================================================

  app.post("/api/fixed-costs", async (req, res) => {
    try {
      const parsed = fixedCostInputSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
      }

      const calculator = await storage.getCalculator();
      const result = calculator.addFixedCost(parsed.data.name, parsed.data.rate);
      if (!result.success) return sendErrors(res, result.errors);

      res.status(201).json(result.data);
    } catch (error) {
      console.error("[calculator] Failed to add fixed cost:", error);
      res.status(500).json({ error: "Failed to add fixed cost" });
    }
  });

  app.delete("/api/fixed-costs/:name", async (req, res) => {
    try {
      const calculator = await storage.getCalculator();
      const result = calculator.removeFixedCost(req.params.name);
      if (!result.success) return sendErrors(res, result.errors);

      res.status(204).send();
    } catch (error) {
      console.error("[calculator] Failed to remove fixed cost:", error);
      res.status(500).json({ error: "Failed to remove fixed cost" });
    }
  });

  // ============================================================================
  // DENSITIES AND PACK SETTINGS
  // ============================================================================

  app.post("/api/densities", async (req, res) => {
    try {
      const parsed = densityInputSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
      }

      const calculator = await storage.getCalculator();
      const result = calculator.addDensity(parsed.data.density);
      if (!result.success) return sendErrors(res, result.errors);

      res.status(201).json({ density: result.data, densities: calculator.getDensities() });
    } catch (error) {
      console.error("[calculator] Failed to add density:", error);
      res.status(500).json({ error: "Failed to add density" });
    }
  });

  app.delete("/api/densities/:density", async (req, res) => {
    try {
      const density = numericInputSchema.safeParse(req.params.density);
      if (!density.success) {
        return res.status(400).json({ error: "Invalid density", details: density.error.issues });
      }

      const calculator = await storage.getCalculator();
      const result = calculator.removeDensity(density.data);
      if (!result.success) return sendErrors(res, result.errors);

      res.status(204).send();
    } catch (error) {
      console.error("[calculator] Failed to remove density:", error);
      res.status(500).json({ error: "Failed to remove density" });
    }
  });

  app.put("/api/densities/:density/pack-setting", async (req, res) => {
    try {
      const density = numericInputSchema.safeParse(req.params.density);
      if (!density.success) {
        return res.status(400).json({ error: "Invalid density", details: density.error.issues });
      }

      const parsed = packSettingSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
      }

      const calculator = await storage.getCalculator();
      const result = calculator.setPackSetting(density.data, parsed.data);
      if (!result.success) return sendErrors(res, result.errors);

      res.json({ density: density.data, setting: result.data });
    } catch (error) {
      console.error("[calculator] Failed to set pack setting:", error);
      res.status(500).json({ error: "Failed to set pack setting" });
    }
  });

  // ============================================================================
  // CALCULATION AND RESULTS
  // ============================================================================

  app.post("/api/calculate", async (req, res) => {
    try {
      const parsed = calculateRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
      }

      const calculator = await storage.getCalculator();
      const result = calculator.calculate(parsed.data.config);
      if (!result.success) return sendErrors(res, result.errors);

      res.json(result.data);
    } catch (error) {
      console.error("[calculator] Calculation request failed:", error);
      res.status(500).json({ error: "Failed to calculate" });
    }
  });

  app.get("/api/results", async (_req, res) => {
    try {
      const calculator = await storage.getCalculator();
      const output = calculator.getLastOutput();
      if (!output) {
        return sendErrors(res, [{
          code: "ERR_NO_RESULTS",
          message: "No results yet",
          suggestion: "Run a calculation first",
          severity: "error",
        }]);
      }

      res.json(output);
    } catch (error) {
      console.error("[calculator] Failed to read results:", error);
      res.status(500).json({ error: "Failed to read results" });
    }
  });

  app.get("/api/columns", (_req, res) => {
    res.json(RESULT_COLUMNS);
  });

  app.get("/api/columns/:columnId/explanation", async (req, res) => {
    try {
      const { columnId } = req.params;
      if (!isResultColumnId(columnId)) {
        return res.status(404).json({ error: `Unknown column: ${columnId}` });
      }

      const query = explanationQuerySchema.safeParse(req.query);
      if (!query.success) {
        return res.status(400).json({ error: "Invalid query", details: query.error.issues });
      }

      const calculator = await storage.getCalculator();
      const explanation = calculator.explainColumn(columnId, query.data.density);
      res.json({ ...explanation, text: formatColumnExplanation(explanation) });
    } catch (error) {
      console.error("[calculator] Failed to explain column:", error);
      res.status(500).json({ error: "Failed to explain column" });
    }
  });

  app.get("/api/export", async (_req, res) => {
    try {
      const calculator = await storage.getCalculator();
      const result = calculator.exportWorkbook();
      if (!result.success) return sendErrors(res, result.errors);

      res.setHeader("Content-Type", XLSX_CONTENT_TYPE);
      res.setHeader("Content-Disposition", `attachment; filename="${DEFAULT_EXPORT_FILENAME}"`);
      res.send(result.data);
    } catch (error) {
      console.error("[calculator] Export failed:", error);
      res.status(500).json({ error: "Failed to export workbook" });
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}

import express from "express";
import cors from "cors";
import type { CalculatorSessionOptions } from "@minwool/engine";

export async function createTestApp(options: CalculatorSessionOptions = {}) {
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  const { registerRoutes } = await import("../routes");
  const { MemStorage } = await import("../storage");
  await registerRoutes(app, new MemStorage(options));

  return app;
}

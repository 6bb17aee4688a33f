import { Router } from "express";
import { config } from "../config";
import citationRoutes from "./citation.routes";

const router = Router();

router.get("/", (req, res) => {
  res.json({
    name: "Excite Citation API",
    version: config.version,
    endpoints: {
      health: "GET /health",
      citations: {
        process: "POST /api/v1/citations/process",
        processText: "POST /api/v1/citations/process-text",
      },
    },
  });
});

router.use("/citations", citationRoutes);

export default router;

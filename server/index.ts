import dotenv from "dotenv";
import path from "node:path";
import { createApp } from "./app.js";
import { createPipelineServicesFromEnv } from "./pipeline/services.js";
import { validateEnv } from "./utils/validateEnv.js";

dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config();

const PORT = process.env.PORT || 3002;

function start() {
  // Validate environment variables first - fail fast with clear instructions
  validateEnv();

  try {
    const app = createApp(createPipelineServicesFromEnv());
    app.listen(PORT, () => {
      console.warn(`Server running on port ${PORT}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
}

start();

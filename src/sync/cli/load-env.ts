import { config } from "dotenv";

// Imported first by the CLI so the logger and env schema see .env.local
config({ path: ".env.local" });

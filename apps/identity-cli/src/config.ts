import dotenv from "dotenv";
import path from "node:path";

// Identity settings (IDENTITY_*, LOG_LEVEL) are read from process.env when an
// identity is created; the CLI lets a local .env supply them.
dotenv.config({
  path: path.resolve(process.cwd(), ".env")
});

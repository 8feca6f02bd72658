/**
 * Environment initialization.
 *
 * Loads `.env` before any other module reads `process.env`, so tool path
 * overrides such as `HISAT2_PATH` can live in a local file.
 */
import dotenv from "dotenv";

dotenv.config({ quiet: true });

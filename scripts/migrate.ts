import fs from "fs";
import path from "path";
import { loadConfig } from "../src/config";
import { createPool } from "../src/db";

async function migrate() {
  const config = loadConfig();
  const pool = createPool(config.databaseUrl, 1);
  const sql = fs.readFileSync(path.join(__dirname, "../db/schema.sql"), "utf8");

  try {
    await pool.query(sql);
    console.log("[MIGRATE] schema applied");
  } finally {
    await pool.end();
  }
}

migrate().catch((err) => {
  console.error("[MIGRATE] failed:", err);
  process.exit(1);
});

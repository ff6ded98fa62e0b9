import { loadConfig } from "../env";
import { createPool } from "./pool";

/**
 * Creates the log tables the report service reads. Writers (the chat
 * handlers, billing) own the data; this only makes a fresh database usable.
 */
async function migrate() {
  const config = loadConfig();
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required to run migrations");
  }
  const pool = createPool(config.databaseUrl);

  console.log("Starting database migration...\n");

  try {
    // 1. Child profile
    await pool.query(`
      CREATE TABLE IF NOT EXISTS child (
        id BIGSERIAL PRIMARY KEY,
        user_phone TEXT NOT NULL,
        name TEXT,
        gender TEXT,
        dob DATE,
        height_cm NUMERIC(5,1),
        weight_kg NUMERIC(5,2),
        created_at TIMESTAMPTZ DEFAULT NOW()
      );
    `);
    await pool.query(`CREATE INDEX IF NOT EXISTS idx_child_user ON child(user_phone, created_at DESC);`);
    console.log("✅ child table ready");

    // 2. Growth measurements
    await pool.query(`
      CREATE TABLE IF NOT EXISTS timbang_log (
        id BIGSERIAL PRIMARY KEY,
        user_phone TEXT NOT NULL,
        date DATE NOT NULL,
        height_cm NUMERIC(5,1),
        weight_kg NUMERIC(5,2),
        head_circum_cm NUMERIC(5,1),
        created_at TIMESTAMPTZ DEFAULT NOW()
      );
    `);
    await pool.query(`CREATE INDEX IF NOT EXISTS idx_timbang_user_date ON timbang_log(user_phone, date);`);
    console.log("✅ timbang_log table ready");

    // 3. Complementary food (MPASI)
    await pool.query(`
      CREATE TABLE IF NOT EXISTS mpasi_log (
        id BIGSERIAL PRIMARY KEY,
        user_phone TEXT NOT NULL,
        date DATE NOT NULL,
        time TIME,
        volume_ml NUMERIC(7,1),
        food_detail TEXT,
        food_grams TEXT,
        est_calories NUMERIC(7,1),
        created_at TIMESTAMPTZ DEFAULT NOW()
      );
    `);
    await pool.query(`CREATE INDEX IF NOT EXISTS idx_mpasi_user_date ON mpasi_log(user_phone, date);`);
    console.log("✅ mpasi_log table ready");

    // 4. Milk feeds (asi = breast milk, sufor = formula)
    await pool.query(`
      CREATE TABLE IF NOT EXISTS milk_intake_log (
        id BIGSERIAL PRIMARY KEY,
        user_phone TEXT NOT NULL,
        date DATE NOT NULL,
        time TIME,
        volume_ml NUMERIC(7,1),
        milk_type TEXT NOT NULL CHECK (milk_type IN ('asi', 'sufor', 'mixed')),
        asi_method TEXT,
        sufor_calorie NUMERIC(7,1),
        note TEXT,
        created_at TIMESTAMPTZ DEFAULT NOW()
      );
    `);
    await pool.query(`CREATE INDEX IF NOT EXISTS idx_milk_user_date ON milk_intake_log(user_phone, date);`);
    console.log("✅ milk_intake_log table ready");

    // 5. Pumping sessions
    await pool.query(`
      CREATE TABLE IF NOT EXISTS pumping_log (
        id BIGSERIAL PRIMARY KEY,
        user_phone TEXT NOT NULL,
        date DATE NOT NULL,
        time TIME,
        left_ml NUMERIC(7,1),
        right_ml NUMERIC(7,1),
        milk_bags INTEGER,
        created_at TIMESTAMPTZ DEFAULT NOW()
      );
    `);
    console.log("✅ pumping_log table ready");

    // 6. Bowel movements
    await pool.query(`
      CREATE TABLE IF NOT EXISTS poop_log (
        id BIGSERIAL PRIMARY KEY,
        user_phone TEXT NOT NULL,
        date DATE NOT NULL,
        time TIME,
        bristol_scale INTEGER,
        created_at TIMESTAMPTZ DEFAULT NOW()
      );
    `);
    console.log("✅ poop_log table ready");

    // 7. Per-user calorie factors
    await pool.query(`
      CREATE TABLE IF NOT EXISTS calorie_setting (
        user_phone TEXT PRIMARY KEY,
        asi_kcal NUMERIC(4,2) DEFAULT 0.67,
        sufor_kcal NUMERIC(4,2) DEFAULT 0.70
      );
    `);
    console.log("✅ calorie_setting table ready");

    // 8. Subscription state (written by billing)
    await pool.query(`
      CREATE TABLE IF NOT EXISTS user_tiers (
        user_phone TEXT PRIMARY KEY,
        tier TEXT NOT NULL DEFAULT 'free',
        messages_today INTEGER DEFAULT 0,
        last_reset DATE
      );
    `);
    await pool.query(`
      CREATE TABLE IF NOT EXISTS user_subscriptions (
        user_phone TEXT PRIMARY KEY,
        subscription_tier TEXT NOT NULL DEFAULT 'free',
        subscription_start TIMESTAMPTZ,
        subscription_end TIMESTAMPTZ
      );
    `);
    console.log("✅ user_tiers / user_subscriptions tables ready");

    console.log("\nMigration complete.");
  } finally {
    await pool.end();
  }
}

migrate().catch((err: unknown) => {
  console.error("Migration failed:", err);
  process.exit(1);
});

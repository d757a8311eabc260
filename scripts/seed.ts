import { loadConfig } from "../server/config";
import { createContext } from "../server/context";
import { openDatabase } from "../server/db";
import { DEFAULT_SEED_DIR, seedDatabase } from "../server/seed";

interface SeedOptions {
  /** Directory holding cyber_incidents.csv, datasets_metadata.csv and it_tickets.csv. */
  dir: string;
}

function parseArgs(argv: string[]): SeedOptions {
  const dirFlag = argv.indexOf("--dir");
  const dir = dirFlag >= 0 ? argv[dirFlag + 1] : undefined;
  return { dir: dir ?? DEFAULT_SEED_DIR };
}

async function main(): Promise<void> {
  const opts = parseArgs(process.argv.slice(2));
  const config = loadConfig();

  const gateway = openDatabase(config.databasePath);
  try {
    gateway.migrate();
    const ctx = createContext(gateway, config.ai);
    const report = await seedDatabase(ctx, config.seed, opts.dir);

    console.log(`Database: ${config.databasePath}`);
    console.log(`Seed directory: ${opts.dir}`);
    console.log(`Admin user id: ${report.adminUserId}`);
    console.log(`Inserted incidents: ${report.incidents}`);
    console.log(`Inserted datasets: ${report.datasets}`);
    console.log(`Inserted tickets: ${report.tickets}`);
  } finally {
    gateway.close();
  }
}

main().catch((err: unknown) => {
  console.error("Seeding failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});

/**
 * Environment variable validation
 * Fails fast at startup with clear instructions if required vars are missing
 */

interface EnvVar {
  name: string;
  required: boolean;
  description: string;
}

const ENV_VARS: EnvVar[] = [
  { name: "DATABASE_URL", required: true, description: "Postgres connection string" },
  {
    name: "OPENAI_API_KEY",
    required: true,
    description: "OpenAI API key for topic discovery, summaries, clustering and scripts",
  },
  {
    name: "YOUTUBE_API_KEY",
    required: false,
    description: "YouTube Data API v3 key for video and channel metadata",
  },
  { name: "APIFY_API_TOKEN", required: false, description: "Apify token for transcript retrieval" },
  {
    name: "APIFY_ACTOR_ID",
    required: false,
    description: "Apify actor that returns subtitles (default streamers~youtube-scraper)",
  },
  {
    name: "GOOGLE_SERVICE_ACCOUNT_FILE",
    required: false,
    description: "Path to the Google service account JSON key used to read the spreadsheet",
  },
  {
    name: "GOOGLE_SPREADSHEET_NAME",
    required: false,
    description: "Name of the spreadsheet holding project rows",
  },
  { name: "GOOGLE_SHEET_NAME", required: false, description: "Sheet (tab) name, default Sheet1" },
  { name: "ACCESS_CODE", required: false, description: "Shared access code for the HTTP API" },
  { name: "PORT", required: false, description: "HTTP port (default 3002)" },
  {
    name: "PIPELINE_ACTOR",
    required: false,
    description: "Name written to created_by / last_modified_by (default pipeline)",
  },
  {
    name: "TRANSCRIPT_FETCH_DELAY_MS",
    required: false,
    description: "Pause between transcript requests in ms (default 2000)",
  },
];

export function validateEnv(): void {
  const missing: EnvVar[] = [];
  const optional: EnvVar[] = [];

  for (const envVar of ENV_VARS) {
    if (!process.env[envVar.name]) {
      if (envVar.required) {
        missing.push(envVar);
      } else {
        optional.push(envVar);
      }
    }
  }

  if (missing.length > 0) {
    console.error("\n" + "=".repeat(60));
    console.error("❌ MISSING REQUIRED ENVIRONMENT VARIABLES");
    console.error("=".repeat(60));
    console.error("\nThe following required environment variables are not set:\n");

    for (const envVar of missing) {
      console.error(`  • ${envVar.name}`);
      console.error(`    ${envVar.description}\n`);
    }

    console.error("-".repeat(60));
    console.error("TO FIX THIS:\n");
    console.error("1. Copy the example env file:");
    console.error("   cp .env.example .env.local\n");
    console.error("2. Edit .env.local and fill in the required values\n");
    console.error("=".repeat(60) + "\n");

    process.exit(1);
  }

  if (optional.length > 0) {
    console.warn("\n⚠️  Optional environment variables not set:");
    for (const envVar of optional) {
      console.warn(`   • ${envVar.name} - ${envVar.description}`);
    }
    console.warn("   Some features may not work without these.\n");
  }

  // The spreadsheet import needs both the key file and the spreadsheet name
  if (process.env.GOOGLE_SERVICE_ACCOUNT_FILE && !process.env.GOOGLE_SPREADSHEET_NAME) {
    console.warn("=".repeat(60));
    console.warn("⚠️  SPREADSHEET CONFIGURATION WARNING");
    console.warn("=".repeat(60));
    console.warn("");
    console.warn("GOOGLE_SERVICE_ACCOUNT_FILE is set, but GOOGLE_SPREADSHEET_NAME is not.");
    console.warn("Importing new projects from the spreadsheet will fail until it is set.");
    console.warn("");
    console.warn("=".repeat(60) + "\n");
  }
}

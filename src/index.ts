import { config as loadDotenv } from "dotenv";
import { main } from "./main.ts";

// .env in the working directory; real environment variables take precedence
loadDotenv();

process.exitCode = await main({
  argv: process.argv.slice(2),
  env: process.env,
});

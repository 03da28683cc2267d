import "dotenv/config";
import { runCli } from "./cli/main";

runCli().catch((error) => {
  console.error(`🔥 Fatal error in main execution: ${error}`);
  process.exit(1);
});

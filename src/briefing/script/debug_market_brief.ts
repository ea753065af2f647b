// Load envs from .env
// Usage: debug_market_brief.ts "<question>" [SYM1,SYM2]
import "dotenv/config";
import { createMarketBriefDependencies } from "../dependencies";
import { generateMarketBrief } from "../generate_market_brief";

async function main() {
  const query = process.argv[2] ?? "What's our risk exposure in Asia tech stocks?";
  const symbols = process.argv[3];
  const brief = await generateMarketBrief(
    { query, symbols },
    createMarketBriefDependencies()
  );
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(brief, null, 2));
}

main().catch(err => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});

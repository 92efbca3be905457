// scripts/build-draft-sankey.ts
// Usage:
//   npx tsx scripts/build-draft-sankey.ts --year 2025 --out_dir viz
//   npx tsx scripts/build-draft-sankey.ts --year=2024 --out_dir=viz --confs=sec
import { main } from "@/lib/draft/cli";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });

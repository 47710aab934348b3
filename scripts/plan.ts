/**
 * Print the order in which derived objects must be created.
 *
 * Usage:
 *   npx tsx scripts/plan.ts [options]
 *
 * Options:
 *   --waves        Group objects that can be created side by side
 *   --only=a,b     Plan only these objects and everything built on them
 *   --json         Print JSON instead of text
 *
 * Environment variables:
 *   DEPLOY_CONFIG  Path to deploy.yml (default: ./deploy.yml)
 *   SCHEMAS_PATH   Root of the schema tree (overrides deploy.yml)
 */

import { loadConfig } from "../lib/config";
import { loadCorpus } from "../lib/corpus/loader";
import { planDeployment, planWaves } from "../lib/planner";
import { reportFailure } from "../lib/report";

interface CliOptions {
  waves: boolean;
  only?: string[];
  json: boolean;
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const only = args.find((a) => a.startsWith("--only="))?.split("=")[1];

  return {
    waves: args.includes("--waves"),
    only: only ? only.split(",").map((name) => name.trim()).filter(Boolean) : undefined,
    json: args.includes("--json"),
  };
}

function main(): void {
  const options = parseArgs();
  const config = loadConfig();
  const corpus = loadCorpus(config.schemasPath);

  if (options.waves) {
    const waves = planWaves(corpus, { only: options.only });
    if (options.json) {
      console.log(JSON.stringify(waves, null, 2));
      return;
    }
    for (const wave of waves) {
      console.log(`Wave ${wave.wave}:`);
      for (const name of wave.objects) console.log(`  ${name}`);
    }
    return;
  }

  const { plan } = planDeployment(corpus, { only: options.only });
  if (options.json) {
    console.log(JSON.stringify(plan, null, 2));
    return;
  }

  console.log("Deployment order:");
  plan.forEach((name, i) => console.log(`  ${i + 1}. ${name}`));
}

try {
  main();
} catch (error) {
  reportFailure(error);
}

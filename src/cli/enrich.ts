import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { runEnrich } from "../pipeline/run";
import { applyLogLevel, exitWithError, inputArg } from "./common";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage("$0 <transcript.md> --links <links.json> [options]")
    .option("links", {
      type: "string",
      demandOption: true,
      describe: 'Link mapping JSON: [{"phrase": "...", "url": "..."}]',
    })
    .option("output", { alias: "o", type: "string", describe: "Output .md file (default: stdout)" })
    .option("warn-unmatched", {
      type: "boolean",
      default: ENV.unmatchedLinks === "warn",
      describe: "Log link phrases that matched nothing",
    })
    .option("log-level", { type: "string" })
    .demandCommand(1, "Provide the Markdown file to enrich")
    .help()
    .parse();

  applyLogLevel(argv["log-level"]);
  await runEnrich({
    input: inputArg(argv._),
    links: argv.links,
    output: argv.output,
    onUnmatched: argv["warn-unmatched"] ? "warn" : "silent",
  });
}

main().catch(exitWithError);

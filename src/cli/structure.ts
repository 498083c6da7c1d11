import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { runStructure } from "../pipeline/run";
import { applyLogLevel, exitWithError, inputArg } from "./common";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage("$0 <transcript.md> --hints <hints.json> [options]")
    .option("hints", { type: "string", demandOption: true, describe: "Structure hints JSON" })
    .option("output", { alias: "o", type: "string", describe: "Output .md file (default: stdout)" })
    .option("video-id", { type: "string", describe: "Video id or URL for timestamp links" })
    .option("info-json", { type: "string", describe: "yt-dlp .info.json; its chapters replace hint sections" })
    .option("links", { type: "string", describe: "Extra link-mapping JSON applied after the hint links" })
    .option("warn-unmatched", {
      type: "boolean",
      default: ENV.unmatchedLinks === "warn",
      describe: "Log link phrases that matched nothing",
    })
    .option("delete-input", { type: "boolean", default: false, describe: "Remove the input after writing --output" })
    .option("log-level", { type: "string" })
    .demandCommand(1, "Provide the sentence-per-line Markdown file")
    .help()
    .parse();

  applyLogLevel(argv["log-level"]);
  await runStructure({
    input: inputArg(argv._),
    hints: argv.hints,
    output: argv.output,
    videoId: argv["video-id"],
    infoJson: argv["info-json"],
    links: argv.links,
    onUnmatched: argv["warn-unmatched"] ? "warn" : "silent",
    deleteInput: argv["delete-input"],
  });
}

main().catch(exitWithError);

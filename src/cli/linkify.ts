import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { runLinkify } from "../pipeline/run";
import { applyLogLevel, exitWithError, inputArg } from "./common";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage("$0 <transcript.md> --video-id <id> [options]")
    .option("video-id", { type: "string", demandOption: true, describe: "Video id or URL" })
    .option("output", { alias: "o", type: "string", describe: "Output .md file (default: stdout)" })
    .option("log-level", { type: "string" })
    .demandCommand(1, "Provide the Markdown file")
    .help()
    .parse();

  applyLogLevel(argv["log-level"]);
  await runLinkify({
    input: inputArg(argv._),
    videoId: argv["video-id"],
    output: argv.output,
  });
}

main().catch(exitWithError);

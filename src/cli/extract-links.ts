import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { runExtractLinks } from "../pipeline/run";
import { applyLogLevel, exitWithError, inputArg } from "./common";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage("$0 <video.info.json|video-url> [options]")
    .option("output", { alias: "o", type: "string", describe: "Output .json file (default: stdout)" })
    .option("log-level", { type: "string" })
    .demandCommand(1, "Provide an .info.json file or a video URL")
    .help()
    .parse();

  applyLogLevel(argv["log-level"]);
  await runExtractLinks({ input: inputArg(argv._), output: argv.output });
}

main().catch(exitWithError);

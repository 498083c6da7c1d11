import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { runVtt2Md } from "../pipeline/run";
import { applyLogLevel, exitWithError, inputArg } from "./common";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage("$0 <vtt-file|video-url> [options]")
    .option("output", { alias: "o", type: "string", describe: "Output .md file (default: stdout)" })
    .option("pause", {
      type: "number",
      default: ENV.pauseSec,
      describe: "Pause (seconds) that starts a new paragraph",
    })
    .option("timestamps", {
      type: "boolean",
      default: true,
      describe: "Prefix sentences with [M:SS] (--no-timestamps to omit)",
    })
    .option("lang", { type: "string", default: ENV.subtitleLang, describe: "Subtitle language for downloads" })
    .option("info-json", { type: "string", describe: "yt-dlp .info.json with title and chapters" })
    .option("log-level", { type: "string" })
    .demandCommand(1, "Provide a VTT file or a video URL")
    .help()
    .parse();

  applyLogLevel(argv["log-level"]);
  const res = await runVtt2Md({
    input: inputArg(argv._),
    output: argv.output,
    pauseSec: argv.pause,
    timestamps: argv.timestamps,
    lang: argv.lang,
    infoJson: argv["info-json"],
  });

  // Metadata for whoever writes the structure hints next
  if (argv.output) {
    const info = res.info;
    console.log(`TITLE: ${info?.title ?? ""}`);
    console.log(`CHAPTERS: ${info?.chapters.length ? "yes" : "no"}`);
    if (info?.description) {
      console.log("---");
      console.log(info.description);
    }
  }
}

main().catch(exitWithError);

import fs from "node:fs";
import path from "node:path";
import { EmptyArchiveError, errorMessage, InvalidInputError } from "../types";
import { ConversionOverrides, PipelineContext, runConversion } from "./pipeline";

export type CommandContext = PipelineContext;

export interface ConvertCommandOptions extends ConversionOverrides {
  inputPath: string;
  outputPath: string;
}

/** `.json` files hold a structured request; anything else is a bare payload. */
export async function readRequestFile(inputPath: string): Promise<unknown> {
  const absolutePath = path.resolve(inputPath);
  const raw = await fs.promises.readFile(absolutePath);
  if (path.extname(absolutePath).toLowerCase() === ".json") {
    try {
      const parsed: unknown = JSON.parse(raw.toString("utf-8"));
      return parsed;
    } catch (error) {
      throw new InvalidInputError(`Request file is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }
  }
  return raw;
}

export async function runConvert(ctx: CommandContext, options: ConvertCommandOptions): Promise<boolean> {
  ctx.logger.info("convert_command_start", { inputPath: options.inputPath, outputPath: options.outputPath });
  const request = await readRequestFile(options.inputPath);

  try {
    const { archive, entries, summary } = await runConversion(request, ctx, options);
    const outputPath = path.resolve(options.outputPath);
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, archive);
    ctx.logger.info("convert_command_complete", {
      outputPath,
      entries: entries.length,
      total: summary.total,
      succeeded: summary.succeeded,
      failed: summary.failed,
    });
    console.log(JSON.stringify(summary, null, 2));
    return true;
  } catch (error) {
    if (error instanceof EmptyArchiveError) {
      ctx.logger.error("convert_command_empty_archive", { total: error.summary.total });
      console.log(JSON.stringify(error.summary, null, 2));
      return false;
    }
    throw error;
  }
}

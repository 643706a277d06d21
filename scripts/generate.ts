import { loadDotEnvFileIfPresent } from "@/lib/config/dotenv";
import { runPipeline } from "@/src/pipeline/executor";
import { renderRunWithLinks } from "@/src/pipeline/render";
import { GenerationRequestSchema, type GenerationRequest } from "@/src/pipeline/types";
import { getPipelineDeps } from "@/src/runtime/pipelineDeps";

const USAGE = 'Usage: generate "<prompt>" [--style <style>] [--shape <shape>] [--image-only]';

export function parseCliArgs(argv: string[]): GenerationRequest {
  const words: string[] = [];
  const fields: Record<string, string> = {};
  let output: "image" | "model" = "model";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--image-only") {
      output = "image";
    } else if (arg === "--style" || arg === "--shape") {
      const value = argv[i + 1];
      if (value === undefined) throw new Error(`${arg} needs a value. ${USAGE}`);
      fields[arg.slice(2)] = value;
      i++;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option ${arg}. ${USAGE}`);
    } else {
      words.push(arg);
    }
  }

  const parsed = GenerationRequestSchema.safeParse({ prompt: words.join(" "), ...fields, output });
  if (!parsed.success) {
    throw new Error(`${parsed.error.issues.map((i) => i.message).join("; ")}. ${USAGE}`);
  }
  return parsed.data;
}

async function run() {
  loadDotEnvFileIfPresent(".env");
  const request = parseCliArgs(process.argv.slice(2));

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const deps = getPipelineDeps();
  const result = await runPipeline(request, deps, { signal: controller.signal });
  console.log(JSON.stringify(await renderRunWithLinks(result, deps.store), null, 2));
  process.exitCode = result.status === "Completed" || result.status === "PartiallyCompleted" ? 0 : 1;
}

if (require.main === module) {
  run().catch((e) => {
    console.error(e instanceof Error ? e.message : e);
    process.exit(1);
  });
}

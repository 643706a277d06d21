import { parseCliArgs } from "@/scripts/generate";

describe("parseCliArgs", () => {
  it("joins bare words into the prompt", () => {
    expect(parseCliArgs(["a", "red", "cube"])).toEqual({ prompt: "a red cube", output: "model" });
  });

  it("reads style, shape and the image-only switch", () => {
    expect(parseCliArgs(["a red cube", "--style", "low poly", "--image-only", "--shape", "cube"])).toEqual({
      prompt: "a red cube",
      style: "low poly",
      shape: "cube",
      output: "image",
    });
  });

  it("rejects unknown options", () => {
    expect(() => parseCliArgs(["a red cube", "--verbose"])).toThrow("Unknown option --verbose.");
  });

  it("rejects an option without its value", () => {
    expect(() => parseCliArgs(["a red cube", "--style"])).toThrow("--style needs a value.");
  });

  it("rejects an empty prompt", () => {
    expect(() => parseCliArgs(["--image-only"])).toThrow(/^prompt is required\. Usage: generate/);
  });
});

import { describe, it, expect } from "vitest";
import { join } from "path";
import { buildConverterArgs } from "./converter.js";

const base = {
  inputFormat: "tf_saved_model",
  outputNodeNames: ["probabilities", "classes"],
  savedModelTags: ["serve"],
};

describe("buildConverterArgs", () => {
  it("builds flags then source and output relative to the working directory", () => {
    expect(
      buildConverterArgs(base, "/srv/app/model", join("export", "1700000000"), "/srv/app/web_model")
    ).toEqual([
      "--input_format=tf_saved_model",
      "--output_node_names=probabilities,classes",
      "--saved_model_tags=serve",
      join("export", "1700000000"),
      join("..", "web_model"),
    ]);
  });

  it("omits empty list flags", () => {
    expect(
      buildConverterArgs(
        { ...base, outputNodeNames: [], savedModelTags: [] },
        "/srv/model",
        "export",
        "/srv/model/out"
      )
    ).toEqual(["--input_format=tf_saved_model", "export", "out"]);
  });

  it("joins several tags with commas", () => {
    const args = buildConverterArgs(
      { ...base, savedModelTags: ["serve", "gpu"] },
      "/srv/model",
      ".",
      "/srv/web"
    );

    expect(args).toContain("--saved_model_tags=serve,gpu");
  });

  it("uses . when output and working directory coincide", () => {
    const args = buildConverterArgs(base, "/srv/model", "export", "/srv/model");

    expect(args[args.length - 1]).toBe(".");
  });
});

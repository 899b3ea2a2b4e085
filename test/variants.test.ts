/**
 * Every built-in stage covers every provider variant, and every supported
 * Terraform variant ships templates that render.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";

import { PROVIDER_VARIANTS } from "../src/core/config/ConfigSchema.js";
import { ConfigurationError } from "../src/core/errors/errors.js";
import { ErrorCode } from "../src/core/errors/ErrorCode.js";
import { DEFAULT_TEMPLATES_DIR, TemplateRenderer } from "../src/core/render/TemplateRenderer.js";
import { BUILTIN_STAGES } from "../src/core/stages/builtin/index.js";
import { dispatch, everyVariant, isSupported, supportedVariants, UNSUPPORTED, type VariantTable } from "../src/core/stages/variants.js";
import { pathExists } from "./helpers/stubs.js";

const TEMPLATED_STAGES = ["01-terraform-state", "02-infrastructure", "03-kubernetes-initialize"];

describe("provider variants", () => {
  it("every built-in stage declares every variant", () => {
    for (const definition of BUILTIN_STAGES) {
      for (const variant of PROVIDER_VARIANTS) {
        expect(definition.variants[variant], `${definition.name}/${variant}`).toBeDefined();
      }
    }
  });

  it("only the state stage leaves variants unsupported", () => {
    const unsupported = BUILTIN_STAGES.flatMap((definition) =>
      PROVIDER_VARIANTS.filter((variant) => !isSupported(definition.variants[variant])).map(
        (variant) => `${definition.name}/${variant}`,
      ),
    );

    expect(unsupported).toEqual(["01-terraform-state/local", "01-terraform-state/existing"]);
  });

  it("ships templates for every supported variant of a templated stage", async () => {
    for (const definition of BUILTIN_STAGES.filter((d) => TEMPLATED_STAGES.includes(d.name))) {
      for (const variant of supportedVariants(definition.variants)) {
        const base = path.join(DEFAULT_TEMPLATES_DIR, definition.name);
        const found = (await pathExists(path.join(base, variant))) || (await pathExists(path.join(base, "common")));
        expect(found, `${definition.name}/${variant}`).toBe(true);
      }
    }
  });

  it("renders every supported variant's templates", async () => {
    const renderer = new TemplateRenderer();
    for (const definition of BUILTIN_STAGES.filter((d) => TEMPLATED_STAGES.includes(d.name))) {
      for (const variant of supportedVariants(definition.variants)) {
        const files = await renderer.render(definition.name, variant, {
          project_name: "demo",
          namespace: "dev",
          provider: variant,
          stage: definition.name,
        });
        expect(Object.keys(files).length, `${definition.name}/${variant}`).toBeGreaterThan(0);
      }
    }
  });

  describe("dispatch", () => {
    const table: VariantTable<string> = { ...everyVariant("shared"), existing: UNSUPPORTED };

    it("returns the variant's entry", () => {
      expect(dispatch(table, "aws", "stage")).toBe("shared");
    });

    it("fails loudly for an unsupported variant", () => {
      expect(() => dispatch(table, "existing", "stage")).toThrow(ConfigurationError);
      expect(() => dispatch(table, "existing", "stage")).toThrow(
        expect.objectContaining({
          code: ErrorCode.PROVIDER_UNSUPPORTED,
          message: "Stage 'stage' does not support provider 'existing'",
        }),
      );
    });

    it("lists supported variants in declaration order", () => {
      expect(supportedVariants(table)).toEqual(["local", "do", "aws", "gcp", "azure"]);
    });
  });
});

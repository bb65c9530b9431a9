import { describe, expect, it } from "vitest";
import { qualifiedSlotName } from "../conflicts.js";
import { renderExternalImport } from "../emitter.js";
import { externalBindingKey, type ExternalBinding } from "../types.js";
import type { ImportBinding } from "../../semantics/binder/index.js";

const external = (binding: ImportBinding, bound: string): ExternalBinding => ({
  key: externalBindingKey(binding),
  binding,
  origin: { moduleId: "main", symbol: 0 },
  bound,
  dottedPlain: binding.form === "import" && !binding.asname && binding.module.includes("."),
  header: true,
});

describe("qualifiedSlotName", () => {
  it("prefixes names with the flattened module id", () => {
    expect(qualifiedSlotName({ moduleId: "app.models", name: "User" })).toBe("app_models_User");
    expect(qualifiedSlotName({ moduleId: "my-lib", name: "load" })).toBe("my_lib_load");
    expect(qualifiedSlotName({ moduleId: "", name: "load" })).toBe("load");
  });
});

describe("renderExternalImport", () => {
  it("renders plain imports", () => {
    const json = external({ form: "import", module: "json", level: 0 }, "json");
    expect(renderExternalImport(json, "json")).toBe("import json");
    expect(renderExternalImport(json, "json_ext")).toBe("import json as json_ext");

    const np = external({ form: "import", module: "numpy", level: 0, asname: "np" }, "np");
    expect(renderExternalImport(np, "np")).toBe("import numpy as np");
  });

  it("renders from imports", () => {
    const path = external({ form: "from", module: "os", level: 0, name: "path" }, "path");
    expect(renderExternalImport(path, "path")).toBe("from os import path");
    expect(renderExternalImport(path, "path_ext")).toBe("from os import path as path_ext");
  });

  it("keys bindings by form, module, name and alias", () => {
    expect(externalBindingKey({ form: "from", module: "os", level: 0, name: "path" })).toBe(
      "from|os|path|",
    );
    expect(externalBindingKey({ form: "import", module: "numpy", level: 0, asname: "np" })).toBe(
      "import|numpy||np",
    );
  });
});

import { describe, expect, it } from "vitest";
import { InvalidTagError } from "../src/errors.js";
import { enumerateBuildSpecs, findMissing } from "../src/matrix/enumerator.js";
import { artifactExists } from "../src/matrix/existence.js";
import { buildMatrix } from "../src/matrix/builder.js";
import { VersionResolver } from "../src/resolver/version-resolver.js";
import { wheelFilename } from "../src/types/build-spec.js";
import type { MatrixConfig, WheelTarget } from "../src/types/config.js";
import { collectingReporter } from "../src/diagnostics.js";
import { FakePackageIndex, InMemoryArtifactStore, release } from "./fakes.js";

const SETTINGS = { bucket: "test-bucket", key_prefix: "packages/", index_url: "https://pypi.example.test/pypi" };

function freebsd13(...tags: string[]): WheelTarget {
  return {
    platform_tag: "freebsd/13.0",
    platform_instance: "freebsd/13.0",
    platform_arch: "x86_64",
    python: tags.map((tag) => ({ tag, abi: "" })),
  };
}

function config(packages: MatrixConfig["packages"]): MatrixConfig {
  return { ...SETTINGS, packages };
}

function index() {
  return new FakePackageIndex({
    pyyaml: { latest: "6.0.1", releases: [release("5.4.1", { name: "pyyaml" }), release("6.0.1", { name: "pyyaml" })] },
    cryptography: { latest: "36.0.1", releases: [release("36.0.1", { name: "cryptography" })] },
  });
}

describe("enumerateBuildSpecs", () => {
  it("expands the cross product and resolves each version once", async () => {
    const idx = index();
    const specs = await enumerateBuildSpecs(
      config({
        pyyaml: { versions: { latest: { wheels: [freebsd13("cp38", "cp39")] }, "5.4.1": { wheels: [freebsd13("cp38")] } } },
      }),
      { resolver: new VersionResolver(idx) },
    );

    expect(specs.map(wheelFilename).sort()).toEqual([
      "pyyaml-5.4.1-cp38-cp38-freebsd/13.0.whl",
      "pyyaml-6.0.1-cp38-cp38-freebsd/13.0.whl",
      "pyyaml-6.0.1-cp39-cp39-freebsd/13.0.whl",
    ]);
    expect(idx.calls).toEqual(["pyyaml@latest", "pyyaml@5.4.1"]);
  });

  it("fills version, sdist url and constraints from resolution", async () => {
    const [spec] = await enumerateBuildSpecs(
      config({ pyyaml: { versions: { "5.4.1": { wheels: [freebsd13("cp38")] } } } }),
      { resolver: new VersionResolver(index()) },
    );
    expect(spec).toEqual({
      package: "pyyaml",
      version: "5.4.1",
      platform_instance: "freebsd/13.0",
      platform_arch: "x86_64",
      python_tag: "cp38",
      abi_tag: "",
      platform_tag: "freebsd/13.0",
      sdist_url: "https://files.example.test/pyyaml-5.4.1.tar.gz",
      constraints: "Cython < 3.0",
    });
  });

  it("deduplicates repeated targets", async () => {
    const specs = await enumerateBuildSpecs(
      config({ pyyaml: { versions: { "6.0.1": { wheels: [freebsd13("cp39", "cp39"), freebsd13("cp39")] } } } }),
      { resolver: new VersionResolver(index()) },
    );
    expect(specs).toHaveLength(1);
  });

  it("rejects a malformed tag before any lookup", async () => {
    const idx = index();
    const store = new InMemoryArtifactStore();
    const run = findMissing(
      config({ pyyaml: { versions: { "6.0.1": { wheels: [freebsd13("cp39", "py3")] } } } }),
      { resolver: new VersionResolver(idx), store },
    );

    await expect(run).rejects.toBeInstanceOf(InvalidTagError);
    expect(idx.calls).toEqual([]);
    expect(store.queries).toEqual([]);
  });
});

describe("findMissing", () => {
  const cfg = config({ cryptography: { versions: { "36.0.1": { wheels: [freebsd13("cp38")] } } } });

  it("returns nothing when every wheel is published", async () => {
    const store = new InMemoryArtifactStore(["packages/cryptography-36.0.1-cp38-cp38-freebsd/13.0.whl"]);
    const missing = await findMissing(cfg, { resolver: new VersionResolver(index()), store });
    expect(missing).toEqual([]);
    expect(buildMatrix(missing)).toEqual({});
  });

  it("produces one job for one missing wheel", async () => {
    const store = new InMemoryArtifactStore();
    const missing = await findMissing(cfg, { resolver: new VersionResolver(index()), store });
    const matrix = buildMatrix(missing);

    expect(Object.keys(matrix)).toEqual(["wheel_freebsd/13.0"]);
    const jobData = JSON.parse(matrix["wheel_freebsd/13.0"].job_data);
    expect(jobData.packages).toHaveLength(1);
    expect(jobData.packages[0].python).toBe("python3.8");
  });

  it("queries storage under the configured key prefix", async () => {
    const store = new InMemoryArtifactStore();
    await findMissing(cfg, { resolver: new VersionResolver(index()), store, keyPrefix: "wheels/" });
    expect(store.queries).toEqual(["wheels/cryptography-36.0.1-cp38-cp38-freebsd/13.0.whl"]);
  });
});

describe("artifactExists", () => {
  it("reports each check and each missing wheel", async () => {
    const [spec] = await enumerateBuildSpecs(
      config({ cryptography: { versions: { "36.0.1": { wheels: [freebsd13("cp38")] } } } }),
      { resolver: new VersionResolver(index()) },
    );
    const report = collectingReporter();

    await expect(artifactExists(new InMemoryArtifactStore(), spec, "packages/", report)).resolves.toBe(false);
    expect(report.diagnostics.map((d) => d.message)).toEqual([
      "checking bucket for cryptography-36.0.1-cp38-cp38-freebsd/13.0.whl",
      "cryptography-36.0.1-cp38-cp38-freebsd/13.0.whl is not present in bucket",
    ]);
  });
});

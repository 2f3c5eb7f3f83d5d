import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import { pathToFileURL } from "node:url";
import fs from "fs-extra";
import { LauncherError } from "../src/errors.js";
import { expandArgs, resolveBaseDir, resolveBaseDirFromDirectory, resolveLaunchPaths } from "../src/paths.js";

async function makeTmp() {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "handoff-paths-")));
}

test("resolves the directory of the launcher file", async () => {
  const tmpRoot = await makeTmp();
  try {
    const launcher = path.join(tmpRoot, "launch.mjs");
    await fs.writeFile(launcher, "", "utf8");
    assert.equal(await resolveBaseDir(launcher), tmpRoot);
    assert.equal(await resolveBaseDir(pathToFileURL(launcher)), tmpRoot);
    assert.equal(await resolveBaseDir(pathToFileURL(launcher).href), tmpRoot);
  } finally {
    await fs.remove(tmpRoot);
  }
});

test("follows symlinks to the real launcher location", async () => {
  const tmpRoot = await makeTmp();
  try {
    const projectDir = path.join(tmpRoot, "project");
    const binDir = path.join(tmpRoot, "bin");
    await fs.ensureDir(projectDir);
    await fs.ensureDir(binDir);
    const launcher = path.join(projectDir, "launch.mjs");
    await fs.writeFile(launcher, "", "utf8");
    await fs.symlink(launcher, path.join(binDir, "launch"));

    assert.equal(await resolveBaseDir(path.join(binDir, "launch")), projectDir);
  } finally {
    await fs.remove(tmpRoot);
  }
});

test("reports a missing launcher as BASE_DIR_UNRESOLVED", async () => {
  const tmpRoot = await makeTmp();
  try {
    await assert.rejects(resolveBaseDir(path.join(tmpRoot, "gone.mjs")), (error: unknown) => {
      assert.ok(error instanceof LauncherError);
      assert.equal(error.code, "BASE_DIR_UNRESOLVED");
      return true;
    });
  } finally {
    await fs.remove(tmpRoot);
  }
});

test("explicit base directory must be a directory", async () => {
  const tmpRoot = await makeTmp();
  try {
    const file = path.join(tmpRoot, "file.txt");
    await fs.writeFile(file, "x", "utf8");
    assert.equal(await resolveBaseDirFromDirectory(tmpRoot), tmpRoot);
    await assert.rejects(resolveBaseDirFromDirectory(file), /Unable to resolve base directory/);
  } finally {
    await fs.remove(tmpRoot);
  }
});

test("derives manifest and entry point paths", () => {
  const paths = resolveLaunchPaths("/app", { manifest: "requirements.txt", entryPoint: "src/main.py" });
  assert.deepEqual(paths, {
    baseDir: "/app",
    manifestPath: "/app/requirements.txt",
    entryPointPath: "/app/src/main.py",
  });
});

test("expands placeholders and leaves other braces alone", () => {
  const paths = resolveLaunchPaths("/app", { manifest: "requirements.txt", entryPoint: "src/main.py" });
  assert.deepEqual(expandArgs(["install", "-r", "{manifest}", "--target={baseDir}/lib", "{other}"], paths), [
    "install",
    "-r",
    "/app/requirements.txt",
    "--target=/app/lib",
    "{other}",
  ]);
  assert.deepEqual(expandArgs(["{entryPoint}"], paths), ["/app/src/main.py"]);
});

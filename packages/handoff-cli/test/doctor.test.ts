import assert from "node:assert/strict";
import { test } from "node:test";
import fs from "fs-extra";
import { DEFAULT_LAUNCHER_CONFIG, resolveLaunchPaths } from "@handoff/core";
import { hasFailures, runDoctorChecks, type VersionCheck } from "../src/services/doctor.js";
import { createCli, createIo, makeProject } from "./helpers/io.js";

test("doctor --json reports paths and checks", async () => {
  const dir = await makeProject(
    { "src/main.py": "print('hello')\n" },
    { runtime: { command: process.execPath }, installer: { command: "handoff-missing-installer" } }
  );
  try {
    const io = createIo();
    const exitCode = await createCli().run(["doctor", "--json", "--base-dir", dir], io.context);

    assert.equal(exitCode, 0);
    const report = JSON.parse(io.getStdout());
    assert.equal(report.base_dir, dir);
    assert.equal(report.entry_point, `${dir}/src/main.py`);
    assert.equal(report.ok, true);
    assert.deepEqual(
      report.checks.map((check: { label: string; status: string }) => [check.label, check.status]),
      [
        ["Entry point present", "ok"],
        ["Dependency manifest present", "warn"],
        [`Runtime '${process.execPath}' runs`, "ok"],
        ["Installer 'handoff-missing-installer' runs", "warn"],
      ]
    );
    assert.equal(report.checks[2].detail, process.version);
  } finally {
    await fs.remove(dir);
  }
});

test("doctor fails without an entry point", async () => {
  const dir = await makeProject({ "requirements.txt": "" }, { runtime: { command: process.execPath } });
  try {
    const io = createIo();
    const exitCode = await createCli().run(["doctor", "--base-dir", dir], io.context);

    assert.equal(exitCode, 1);
    const output = io.getStdout();
    assert.match(output, /^Handoff Doctor\n/);
    assert.match(output, /Entry point present — Missing .*src\/main\.py/);
    assert.match(output, /Configuration: defaults → project/);
  } finally {
    await fs.remove(dir);
  }
});

test("doctor reports an invalid configuration file", async () => {
  const dir = await makeProject({}, { pause: "later" });
  try {
    const io = createIo();
    const exitCode = await createCli().run(["doctor", "--base-dir", dir], io.context);

    assert.equal(exitCode, 1);
    assert.match(io.getStderr(), /^handoff doctor failed: Invalid configuration in .*handoff\.config\.yaml: pause: /);
  } finally {
    await fs.remove(dir);
  }
});

test("runDoctorChecks uses the given version check and skips a disabled installer", async () => {
  const dir = await makeProject({ "src/main.py": "", "requirements.txt": "" });
  const calls: string[] = [];
  const versionCheck: VersionCheck = async (command, args) => {
    calls.push([command, ...args].join(" "));
    return command === "python3" ? { ok: false, output: "" } : { ok: true, output: "pip 24.0" };
  };
  try {
    const config = { ...DEFAULT_LAUNCHER_CONFIG, installer: { ...DEFAULT_LAUNCHER_CONFIG.installer, enabled: false } };
    const checks = await runDoctorChecks({ config, paths: resolveLaunchPaths(dir, config), versionCheck });

    assert.deepEqual(calls, ["python3 --version"]);
    assert.deepEqual(checks.slice(2), [
      { label: "Runtime 'python3' runs", status: "fail", detail: "python3 is not runnable" },
      { label: "Installer 'pip' runs", status: "skip", detail: "installation disabled" },
    ]);
    assert.equal(hasFailures(checks), true);
  } finally {
    await fs.remove(dir);
  }
});

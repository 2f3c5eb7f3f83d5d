export { RunCommand } from "./commands/run.js";
export { DoctorCommand } from "./commands/doctor.js";
export { ConfigPrintCommand } from "./commands/config.js";
export { HandoffCommand } from "./commands/base.js";
export type { LaunchContext } from "./commands/base.js";
export { formatLaunchEvent } from "./services/events.js";
export { hasFailures, runVersionCheck, runDoctorChecks } from "./services/doctor.js";
export type { CheckStatus, VersionCheck, DoctorCheck, DoctorOptions, VersionCheckResult } from "./services/doctor.js";
export { HANDOFF_VERSION } from "./version.js";

export const HANDOFF_VERSION = "0.1.0";

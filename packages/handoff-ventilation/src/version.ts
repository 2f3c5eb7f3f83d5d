export const VENTILATION_VERSION = "0.1.0";

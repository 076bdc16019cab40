export const EXPORTER_VERSION = "1.1.0";

export const NAME = "merge-report";
export const VERSION = "0.1.0";

export const CLI_NAME = "xpath-edit";
export const CLI_VERSION = "0.1.0";

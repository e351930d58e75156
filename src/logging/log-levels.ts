// Syslog level names, as used by winston's `config.syslog.levels`.
export const EMERG = "emerg";
export const ALERT = "alert";
export const CRIT = "crit";
export const ERROR = "error";
export const WARNING = "warning";
export const NOTICE = "notice";
export const INFO = "info";
export const DEBUG = "debug";

export const LOG_LEVELS: readonly string[] = [EMERG, ALERT, CRIT, ERROR, WARNING, NOTICE, INFO, DEBUG];

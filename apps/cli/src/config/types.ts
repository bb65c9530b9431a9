export type MergeConfig = {
  command: "merge";
  entry: string;
  /** Defaults to the directory of `entry`. */
  projectRoot?: string;
  /** Defaults to `<entry dir>/<entry stem>_merged.py`. */
  out?: string;
  verify: boolean;
  color: boolean;
};

export type AuditConfig = {
  command: "audit";
  files: string[];
  json: boolean;
};

export type PyfuseConfig = MergeConfig | AuditConfig;

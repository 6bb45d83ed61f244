export type ErrorReport = {
  state: "error";
  error: string;
  specific: ErrorSpecific[];
};

export type ErrorSpecific = {
  message: string;
  step?: string;
  unit?: string;
  owner?: string;
  archive?: string;
  file?: string;
};

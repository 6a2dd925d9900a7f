export class ChanopError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChanopError";
  }
}

/** Missing or unusable configuration; raised before anything is queued. */
export class ChanopConfigError extends ChanopError {
  constructor(
    message: string,
    public readonly setting?: string,
  ) {
    super(message);
    this.name = "ChanopConfigError";
  }
}

export class ChanopArgumentError extends ChanopError {
  constructor(message: string) {
    super(message);
    this.name = "ChanopArgumentError";
  }
}

export type ChanopConfigIssue = {
  path: string;
  message: string;
};

export class ChanopConfigFileError extends ChanopError {
  constructor(
    message: string,
    public readonly configPath: string,
    public readonly issues: ChanopConfigIssue[] = [],
  ) {
    super(message);
    this.name = "ChanopConfigFileError";
  }
}

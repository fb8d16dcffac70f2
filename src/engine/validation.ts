export interface ValidationIssue {
  level: "error" | "warning" | "info";
  code: string;
  message: string;
}

export interface ValidationResult {
  ok: boolean;
  issues: ValidationIssue[];
}

function toResult(issues: ValidationIssue[]): ValidationResult {
  return {
    ok: !issues.some((issue) => issue.level === "error"),
    issues,
  };
}

export function validateKFactor(kFactor: number): ValidationResult {
  const issues: ValidationIssue[] = [];

  if (!Number.isFinite(kFactor)) {
    issues.push({
      level: "error",
      code: "K_FACTOR_NOT_FINITE",
      message: `K-factor ${kFactor} is not a finite number`,
    });
    return toResult(issues);
  }

  if (kFactor < 0) {
    issues.push({
      level: "error",
      code: "K_FACTOR_NEGATIVE",
      message: `K-factor ${kFactor} is negative; wins would lower the winner's rating`,
    });
  }
  if (!Number.isInteger(kFactor)) {
    issues.push({
      level: "warning",
      code: "K_FACTOR_NOT_INTEGER",
      message: `K-factor ${kFactor} is not a whole number`,
    });
  }
  if (kFactor === 0) {
    issues.push({
      level: "info",
      code: "K_FACTOR_ZERO",
      message: "K-factor is 0; no outcome will change any rating",
    });
  }

  return toResult(issues);
}

export function validateRating(rating: number): ValidationResult {
  if (Number.isFinite(rating)) {
    return toResult([]);
  }
  return toResult([
    {
      level: "error",
      code: "RATING_NOT_FINITE",
      message: `Rating ${rating} is not a finite number`,
    },
  ]);
}

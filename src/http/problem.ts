export interface FieldError {
  path: string;
  message: string;
}

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

const TITLES: Record<string, string> = {
  INVALID_ARGUMENT: "Invalid argument",
  UNSUPPORTED_MEDIA_TYPE: "Unsupported media type",
  NOT_FOUND: "Not found",
};

export function problem(params: Omit<Problem, "type" | "title"> & { code: string }): Problem {
  return {
    type: `https://errors.term-matcher.local/${params.code.toLowerCase().replace(/_/g, "-")}`,
    title: TITLES[params.code] ?? "Internal error",
    status: params.status,
    detail: params.detail,
    instance: params.instance,
    code: params.code,
    requestId: params.requestId,
    errors: params.errors,
  };
}

export function internalProblem(ctx: { instance: string; requestId: string }): Problem {
  return problem({ status: 500, code: "INTERNAL", detail: "internal error", ...ctx });
}

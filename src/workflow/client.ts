/**
 * HTTP client for the workflow "run" endpoint.
 *
 * The scheduler treats a run as opaque: it only looks at `success`.
 */

export const DEFAULT_BASE_URL = "https://api.coze.cn";

export interface WorkflowClientOptions {
  token: string;
  baseUrl?: string;
  fetch?: typeof fetch;
}

export interface WorkflowRunRequest {
  workflowId: string;
  parameters?: Record<string, unknown>;
}

export interface WorkflowRunResult {
  success: boolean;
  output: unknown;
  error?: string;
  debugUrl?: string;
  executeId?: string;
}

interface WorkflowRunResponse {
  code?: number;
  msg?: string;
  data?: unknown;
  debug_url?: string;
  execute_id?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRunResponse(body: unknown): WorkflowRunResponse {
  if (!isRecord(body)) return {};
  return {
    code: typeof body.code === "number" ? body.code : undefined,
    msg: typeof body.msg === "string" ? body.msg : undefined,
    data: body.data,
    debug_url: typeof body.debug_url === "string" ? body.debug_url : undefined,
    execute_id: typeof body.execute_id === "string" ? body.execute_id : undefined,
  };
}

/** `data` is usually a JSON string; hand back the parsed value when it is. */
function decodeOutput(data: unknown): unknown {
  if (typeof data !== "string") return data;
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

export class WorkflowClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly fetchImpl?: typeof fetch;

  constructor(options: WorkflowClientOptions) {
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetch;
  }

  get endpoint(): string {
    return `${this.baseUrl}/v1/workflow/run`;
  }

  /**
   * Run a workflow synchronously. HTTP and API-level failures come back as
   * `success: false`; network errors and aborts are thrown.
   */
  async runWorkflow(request: WorkflowRunRequest, signal?: AbortSignal): Promise<WorkflowRunResult> {
    const doFetch = this.fetchImpl ?? fetch;
    const response = await doFetch(this.endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.token}`,
      },
      body: JSON.stringify({
        workflow_id: request.workflowId,
        parameters: request.parameters ?? {},
      }),
      signal,
    });

    if (!response.ok) {
      const text = await response.text();
      return { success: false, output: null, error: `HTTP ${response.status}: ${text}` };
    }

    const body = toRunResponse(await response.json());
    if (body.code !== undefined && body.code !== 0) {
      return {
        success: false,
        output: null,
        error: `API error ${body.code}: ${body.msg ?? "unknown error"}`,
        debugUrl: body.debug_url,
      };
    }

    return {
      success: true,
      output: decodeOutput(body.data),
      debugUrl: body.debug_url,
      executeId: body.execute_id,
    };
  }
}

/**
 * Tool Invoker
 * Dispatches oracle-requested tool calls to the tool server.
 * Always resolves to a ToolCallResult so one failing tool never aborts a turn.
 */

import { TimeoutError, ToolInvocationError, UnknownToolError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { READ_RESOURCE_TOOL, type ToolCatalog } from './catalog.js';
import type { ToolCallRequest, ToolCallResult, ToolOutcome, ToolProvider } from './types.js';

export interface ToolInvokerOptions {
  timeoutMs: number;
}

export interface InvocationContext {
  correlationId: string;
  sessionId: string;
}

export class ToolInvoker {
  constructor(
    private readonly catalog: ToolCatalog,
    private readonly provider: ToolProvider,
    private readonly options: ToolInvokerOptions
  ) {}

  async invoke(request: ToolCallRequest, context: InvocationContext): Promise<ToolCallResult> {
    const log = logger.child({
      correlationId: context.correlationId,
      sessionId: context.sessionId,
      toolName: request.toolName,
    });

    const startTime = Date.now();
    let outcome: ToolOutcome;

    if (!this.catalog.isInitialized() || !this.catalog.has(request.toolName)) {
      const error = new UnknownToolError(request.toolName);
      log.warn('Tool not found in catalog');
      outcome = { success: false, error: { code: 'UNKNOWN_TOOL', message: error.message } };
      return this.toResult(request, outcome);
    }

    const invalid = this.validateArguments(request);
    if (invalid) {
      log.warn({ args: request.arguments }, invalid);
      outcome = { success: false, error: { code: 'INVALID_ARGUMENTS', message: invalid } };
      return this.toResult(request, outcome);
    }

    log.info({ args: request.arguments }, 'Executing tool');

    try {
      const data = await withTimeout(
        (signal) => this.dispatch(request, signal),
        this.options.timeoutMs,
        `Tool '${request.toolName}'`
      );
      outcome = { success: true, data };
    } catch (error) {
      if (error instanceof TimeoutError) {
        outcome = { success: false, error: { code: 'TIMEOUT', message: error.message } };
      } else {
        const message =
          error instanceof ToolInvocationError
            ? error.message
            : `Tool '${request.toolName}' failed: ${errorMessage(error)}`;
        outcome = { success: false, error: { code: 'TOOL_INVOCATION_ERROR', message } };
      }
    }

    log.info(
      {
        success: outcome.success,
        latencyMs: Date.now() - startTime,
        status: outcome.success ? 'SUCCESS' : outcome.error.code,
      },
      'Tool execution complete'
    );

    return this.toResult(request, outcome);
  }

  /** Message describing why the call cannot be sent, if it cannot */
  private validateArguments(request: ToolCallRequest): string | undefined {
    if (request.toolName === READ_RESOURCE_TOOL && !isNonEmptyString(request.arguments.uri)) {
      return `'${READ_RESOURCE_TOOL}' requires a string 'uri' argument`;
    }
    return undefined;
  }

  private dispatch(request: ToolCallRequest, signal: AbortSignal): Promise<unknown> {
    const callOptions = { signal, timeoutMs: this.options.timeoutMs };
    const uri = request.arguments.uri;

    if (request.toolName === READ_RESOURCE_TOOL && isNonEmptyString(uri)) {
      return this.provider.readResource(uri, callOptions);
    }

    return this.provider.callTool(request.toolName, request.arguments, callOptions);
  }

  private toResult(request: ToolCallRequest, outcome: ToolOutcome): ToolCallResult {
    return {
      toolCallId: request.id,
      toolName: request.toolName,
      arguments: request.arguments,
      outcome,
    };
  }
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

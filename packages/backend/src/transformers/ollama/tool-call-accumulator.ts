import type { OllamaResponseToolCall, OpenAIToolCallDelta } from '@llamabridge/types';
import { parseToolArguments } from './tool-mapper';

interface AccumulatedToolCall {
  id: string;
  type: string;
  name: string;
  args: string;
}

/**
 * Reassembles tool calls that the backend streams as sparse deltas.
 * Entries are keyed by the delta index and owned by one stream.
 */
export class ToolCallAccumulator {
  private calls = new Map<number, AccumulatedToolCall>();

  get size(): number {
    return this.calls.size;
  }

  apply(delta: OpenAIToolCallDelta): void {
    let call = this.calls.get(delta.index);
    if (!call) {
      call = { id: '', type: '', name: '', args: '' };
      this.calls.set(delta.index, call);
    }

    // A later empty field must not erase an earlier value
    if (delta.id) call.id = delta.id;
    if (delta.type) call.type = delta.type;
    if (delta.function?.name) call.name = delta.function.name;
    call.args += delta.function?.arguments ?? '';
  }

  /**
   * Finalizes every call in index order and empties the accumulator.
   * Calls that never received a name are dropped.
   */
  drain(): OllamaResponseToolCall[] {
    const entries = [...this.calls.entries()].sort(([a], [b]) => a - b);
    this.calls.clear();

    const result: OllamaResponseToolCall[] = [];
    for (const [index, call] of entries) {
      if (!call.name) continue;

      const toolCall: OllamaResponseToolCall = {
        function: { index, name: call.name, arguments: parseToolArguments(call.args) },
      };
      if (call.id) toolCall.id = call.id;
      if (call.type) toolCall.type = call.type;
      result.push(toolCall);
    }
    return result;
  }
}

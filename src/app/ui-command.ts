export type UiCommand =
  | { readonly type: 'attach'; readonly name: string }
  | { readonly type: 'detach'; readonly name: string }
  | { readonly type: 'resize'; readonly name: string; readonly cols: number; readonly rows: number }
  | { readonly type: 'send-input'; readonly name: string; readonly bytes: Uint8Array }
  | { readonly type: 'scroll'; readonly name: string; readonly delta: number }
  | { readonly type: 'resume'; readonly name: string }
  | { readonly type: 'close'; readonly name: string };

export function describeUiCommand(command: UiCommand): string {
  switch (command.type) {
    case 'resize':
      return `resize ${command.name} to ${String(command.cols)}x${String(command.rows)}`;
    case 'send-input':
      return `send ${String(command.bytes.length)} bytes to ${command.name}`;
    case 'scroll':
      return `scroll ${command.name} by ${String(command.delta)}`;
    default:
      return `${command.type} ${command.name}`;
  }
}

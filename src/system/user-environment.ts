import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { EnvironmentError } from "../services/errors.js";
import { createLogger } from "../services/logger.js";

const execFileAsync = promisify(execFile);
const log = createLogger("user-env");

/** Persistent user-scope environment variables. */
export interface UserEnvironment {
  get(name: string): Promise<string | null>;
  set(name: string, value: string): Promise<void>;
  remove(name: string): Promise<void>;
}

export type PowerShellRunner = (script: string) => Promise<string>;

async function runPowerShell(script: string): Promise<string> {
  const { stdout, stderr } = await execFileAsync("powershell", [
    "-NoProfile",
    "-NonInteractive",
    "-Command",
    script,
  ], { windowsHide: true });

  if (stderr && stderr.trim().length > 0) {
    throw new Error(stderr.trim());
  }
  return stdout.replace(/[\r\n]+$/g, "");
}

export function escapeForPowerShell(value: string): string {
  return value.replace(/'/g, "''");
}

const ENVIRONMENT_KEY = "[Microsoft.Win32.Registry]::CurrentUser.OpenSubKey('Environment', $true)";

// WM_SETTINGCHANGE with "Environment", as the system dialog sends after an edit.
const BROADCAST_SETTING_CHANGE = [
  "Add-Type -Namespace WinCli -Name NativeMethods -MemberDefinition '[DllImport(\"user32.dll\", CharSet = CharSet.Auto)] public static extern IntPtr SendMessageTimeout(IntPtr hWnd, uint Msg, UIntPtr wParam, string lParam, uint fuFlags, uint uTimeout, out UIntPtr lpdwResult);'",
  "$result = [UIntPtr]::Zero",
  "[void][WinCli.NativeMethods]::SendMessageTimeout([IntPtr]0xffff, 0x1A, [UIntPtr]::Zero, 'Environment', 2, 5000, [ref]$result)",
];

export function readUserVariableScript(name: string): string {
  return `(Get-Item 'HKCU:\\Environment').GetValue('${escapeForPowerShell(name)}', '', 'DoNotExpandEnvironmentNames')`;
}

export function writeUserVariableScript(name: string, value: string): string {
  const quotedName = `'${escapeForPowerShell(name)}'`;
  const defaultKind = value.includes("%") ? "ExpandString" : "String";
  return [
    `$key = ${ENVIRONMENT_KEY}`,
    `$kind = if ($key.GetValueNames() -contains ${quotedName}) { $key.GetValueKind(${quotedName}) } else { '${defaultKind}' }`,
    `$key.SetValue(${quotedName}, '${escapeForPowerShell(value)}', $kind)`,
    "$key.Close()",
    ...BROADCAST_SETTING_CHANGE,
  ].join("\n");
}

export function deleteUserVariableScript(name: string): string {
  return [
    `$key = ${ENVIRONMENT_KEY}`,
    `$key.DeleteValue('${escapeForPowerShell(name)}', $false)`,
    "$key.Close()",
    ...BROADCAST_SETTING_CHANGE,
  ].join("\n");
}

/**
 * Values under HKCU\Environment, read and written through the registry API so
 * `%VAR%` references stay unexpanded and an existing value keeps its kind
 * (REG_SZ or REG_EXPAND_SZ). Writes broadcast WM_SETTINGCHANGE, so newly
 * started programs see the value.
 */
export class WindowsUserEnvironment implements UserEnvironment {
  constructor(private readonly run: PowerShellRunner = runPowerShell) {}

  async get(name: string): Promise<string | null> {
    const output = await this.invoke(name, readUserVariableScript(name));
    return output.length > 0 ? output : null;
  }

  async set(name: string, value: string): Promise<void> {
    await this.invoke(name, writeUserVariableScript(name, value));
    process.env[name] = value;
    log.debug("Set user environment variable", { name });
  }

  async remove(name: string): Promise<void> {
    await this.invoke(name, deleteUserVariableScript(name));
    delete process.env[name];
    log.debug("Removed user environment variable", { name });
  }

  private async invoke(name: string, script: string): Promise<string> {
    try {
      return await this.run(script);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new EnvironmentError(name, `Failed to access user environment variable '${name}': ${reason}`, err);
    }
  }
}

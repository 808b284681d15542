import { execFile } from "child_process";
import { z } from "zod";
import type { WindowInfo } from "../shared/types";

export interface WindowSystem {
  listWindows(): Promise<WindowInfo[]>;
  restore(id: string): Promise<void>;
}

export type PowerShellRunner = (script: string) => Promise<string>;

const WIN32_TYPES = `
Add-Type @"
using System;
using System.Runtime.InteropServices;
using System.Text;
public class RelayWin32 {
  public delegate bool EnumWindowsProc(IntPtr hWnd, IntPtr lParam);
  [DllImport("user32.dll")] public static extern bool EnumWindows(EnumWindowsProc lpEnumFunc, IntPtr lParam);
  [DllImport("user32.dll")] public static extern bool IsWindowVisible(IntPtr hWnd);
  [DllImport("user32.dll")] public static extern bool IsIconic(IntPtr hWnd);
  [DllImport("user32.dll")] public static extern bool ShowWindow(IntPtr hWnd, int nCmdShow);
  [DllImport("user32.dll")] public static extern int GetWindowText(IntPtr hWnd, StringBuilder text, int count);
  [DllImport("user32.dll")] public static extern int GetWindowTextLength(IntPtr hWnd);
  [DllImport("user32.dll")] public static extern bool GetWindowRect(IntPtr hWnd, out RECT rect);
  [DllImport("user32.dll")] public static extern bool GetClientRect(IntPtr hWnd, out RECT rect);
  [DllImport("user32.dll")] public static extern bool ClientToScreen(IntPtr hWnd, ref POINT point);
  [DllImport("user32.dll")] public static extern bool GetWindowPlacement(IntPtr hWnd, ref WINDOWPLACEMENT placement);
  [DllImport("user32.dll")] public static extern bool SetProcessDPIAware();
  [StructLayout(LayoutKind.Sequential)] public struct RECT { public int Left; public int Top; public int Right; public int Bottom; }
  [StructLayout(LayoutKind.Sequential)] public struct POINT { public int X; public int Y; }
  [StructLayout(LayoutKind.Sequential)] public struct WINDOWPLACEMENT {
    public int length; public int flags; public int showCmd;
    public POINT ptMinPosition; public POINT ptMaxPosition; public RECT rcNormalPosition;
  }
}
"@
[RelayWin32]::SetProcessDPIAware() | Out-Null
`.trim();

const WINDOW_LIST_SCRIPT = `
${WIN32_TYPES}
$windows = New-Object System.Collections.Generic.List[object]
[RelayWin32]::EnumWindows({ param($hWnd, $lParam)
  if (-not [RelayWin32]::IsWindowVisible($hWnd)) { return $true }
  $len = [RelayWin32]::GetWindowTextLength($hWnd)
  if ($len -le 0) { return $true }
  $sb = New-Object System.Text.StringBuilder ($len + 1)
  [RelayWin32]::GetWindowText($hWnd, $sb, $sb.Capacity) | Out-Null
  $outer = New-Object RelayWin32+RECT
  [RelayWin32]::GetWindowRect($hWnd, [ref]$outer) | Out-Null
  $client = New-Object RelayWin32+RECT
  [RelayWin32]::GetClientRect($hWnd, [ref]$client) | Out-Null
  $origin = New-Object RelayWin32+POINT
  [RelayWin32]::ClientToScreen($hWnd, [ref]$origin) | Out-Null
  $placement = New-Object RelayWin32+WINDOWPLACEMENT
  $placement.length = [System.Runtime.InteropServices.Marshal]::SizeOf($placement)
  [RelayWin32]::GetWindowPlacement($hWnd, [ref]$placement) | Out-Null
  $normal = $placement.rcNormalPosition
  $windows.Add([pscustomobject]@{
    id = $hWnd.ToInt64()
    title = $sb.ToString()
    minimized = [RelayWin32]::IsIconic($hWnd)
    outer = @{ left = $outer.Left; top = $outer.Top; right = $outer.Right; bottom = $outer.Bottom }
    normal = @{ left = $normal.Left; top = $normal.Top; right = $normal.Right; bottom = $normal.Bottom }
    client = @{
      left = $origin.X
      top = $origin.Y
      right = $origin.X + $client.Right - $client.Left
      bottom = $origin.Y + $client.Bottom - $client.Top
    }
  }) | Out-Null
  return $true
}, [IntPtr]::Zero) | Out-Null
ConvertTo-Json -InputObject @($windows) -Compress -Depth 4
`.trim();

const WINDOW_RESTORE_SCRIPT = `
${WIN32_TYPES}
$hwnd = [IntPtr]::new($Id)
if ([RelayWin32]::IsIconic($hwnd)) {
  [RelayWin32]::ShowWindow($hwnd, 9) | Out-Null
  Start-Sleep -Milliseconds 150
}
`.trim();

const rectSchema = z.object({
  left: z.number(),
  top: z.number(),
  right: z.number(),
  bottom: z.number()
});

const windowListSchema = z.array(
  z.object({
    id: z.union([z.number(), z.string()]),
    title: z.string(),
    minimized: z.boolean(),
    outer: rectSchema,
    client: rectSchema,
    normal: rectSchema.optional()
  })
);

export const runPowerShell: PowerShellRunner = (script) =>
  new Promise((resolve, reject) => {
    const encoded = Buffer.from(script, "utf16le").toString("base64");
    execFile(
      "powershell.exe",
      ["-NoProfile", "-ExecutionPolicy", "Bypass", "-EncodedCommand", encoded],
      { windowsHide: true, maxBuffer: 10 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (error) {
          reject(new Error(stderr?.trim() || error.message));
          return;
        }
        resolve(stdout.trim());
      }
    );
  });

export const parseWindowList = (output: string): WindowInfo[] => {
  if (!output) {
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch (error: unknown) {
    throw new Error(
      `Failed to parse window list: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const validation = windowListSchema.safeParse(Array.isArray(parsed) ? parsed : [parsed]);
  if (!validation.success) {
    throw new Error(
      `Unexpected window list shape: ${validation.error.errors.map((err) => err.message).join("; ")}`
    );
  }
  return validation.data.map((win) => ({
    id: String(win.id),
    title: win.title,
    minimized: win.minimized,
    outer: win.outer,
    client: win.client,
    ...(win.normal ? { normal: win.normal } : {})
  }));
};

export class Win32WindowSystem implements WindowSystem {
  constructor(private readonly run: PowerShellRunner = runPowerShell) {}

  async listWindows(): Promise<WindowInfo[]> {
    return parseWindowList(await this.run(WINDOW_LIST_SCRIPT));
  }

  async restore(id: string): Promise<void> {
    if (!/^\d+$/.test(id)) {
      throw new Error("Invalid window id.");
    }
    await this.run(`$Id = [Int64]${id}\n${WINDOW_RESTORE_SCRIPT}`);
  }
}

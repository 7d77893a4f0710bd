import screenshot from "screenshot-desktop";
import { formatErrorMessage, loggerFor } from "../logger.js";
import { runCommand, type CommandRunner } from "../system/commandRunner.js";
import { UNKNOWN_WINDOW, type WindowInfo } from "./types.js";

export interface ScreenGrabber {
  /** PNG bytes of the primary display. */
  grab(): Promise<Buffer>;
}

export interface WindowProbe {
  /** Foreground window; `UNKNOWN_WINDOW` when it cannot be determined. */
  activeWindow(): Promise<WindowInfo>;
}

const log = loggerFor("capture");

export class DesktopScreenGrabber implements ScreenGrabber {
  async grab(): Promise<Buffer> {
    return screenshot({ format: "png" });
  }
}

const WINDOWS_FOREGROUND_SCRIPT = [
  "Add-Type @'",
  "using System; using System.Runtime.InteropServices; using System.Text;",
  "public static class Fg {",
  '  [DllImport("user32.dll")] public static extern IntPtr GetForegroundWindow();',
  '  [DllImport("user32.dll")] public static extern int GetWindowText(IntPtr h, StringBuilder s, int n);',
  '  [DllImport("user32.dll")] public static extern uint GetWindowThreadProcessId(IntPtr h, out uint pid);',
  "}",
  "'@",
  "$h = [Fg]::GetForegroundWindow(); $sb = New-Object System.Text.StringBuilder 512",
  "[void][Fg]::GetWindowText($h, $sb, 512); $procId = 0; [void][Fg]::GetWindowThreadProcessId($h, [ref]$procId)",
  "$p = Get-Process -Id $procId",
  "Write-Output $procId; Write-Output ($p.ProcessName + '.exe'); Write-Output $sb.ToString()",
].join("\n");

const MAC_FOREGROUND_SCRIPT = [
  'tell application "System Events"',
  "  set frontApp to first application process whose frontmost is true",
  "  set appName to name of frontApp",
  "  set appPid to unix id of frontApp",
  '  set winTitle to ""',
  "  try",
  "    set winTitle to name of front window of frontApp",
  "  end try",
  "end tell",
  'return (appPid as text) & linefeed & appName & linefeed & winTitle',
].join("\n");

/** Foreground window via PowerShell, osascript or xdotool depending on the platform. */
export class SystemWindowProbe implements WindowProbe {
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;

  constructor(platform: NodeJS.Platform = process.platform, run: CommandRunner = runCommand) {
    this.platform = platform;
    this.run = run;
  }

  async activeWindow(): Promise<WindowInfo> {
    try {
      switch (this.platform) {
        case "win32": {
          const { stdout } = await this.run("powershell", ["-NoProfile", "-NonInteractive", "-Command", WINDOWS_FOREGROUND_SCRIPT]);
          return parseProbeOutput(stdout);
        }
        case "darwin": {
          const { stdout } = await this.run("osascript", ["-e", MAC_FOREGROUND_SCRIPT]);
          return parseProbeOutput(stdout);
        }
        default:
          return await this.linuxActiveWindow();
      }
    } catch (error) {
      log.debug(`window probe failed platform=${this.platform} error=${formatErrorMessage(error)}`);
      return { ...UNKNOWN_WINDOW };
    }
  }

  private async linuxActiveWindow(): Promise<WindowInfo> {
    const { stdout: title } = await this.run("xdotool", ["getactivewindow", "getwindowname"]);
    const { stdout: pidText } = await this.run("xdotool", ["getactivewindow", "getwindowpid"]);
    const pid = Number.parseInt(pidText.trim(), 10);
    if (!Number.isInteger(pid) || pid <= 0) {
      return { application: "Unknown", window_title: title.trim() || "Unknown", pid: 0 };
    }
    const { stdout: comm } = await this.run("ps", ["-p", String(pid), "-o", "comm="]);
    return { application: comm.trim() || "Unknown", window_title: title.trim() || "Unknown", pid };
  }
}

/** Three lines: pid, application, window title. */
export function parseProbeOutput(stdout: string): WindowInfo {
  const [pidLine = "", application = "", ...titleLines] = stdout.replace(/\r/g, "").split("\n");
  const pid = Number.parseInt(pidLine.trim(), 10);
  const title = titleLines.join(" ").trim();
  return {
    application: application.trim() || "Unknown",
    window_title: title || "Unknown",
    pid: Number.isInteger(pid) && pid > 0 ? pid : 0,
  };
}

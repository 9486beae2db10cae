import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { StreamPreflightError, buildPipeline, runPipeline } from "./hailo";
import type { CommandResult, CommandRunner } from "../utils/commands";

class ScriptedRunner implements CommandRunner {
  readonly calls: { command: string; args: string[]; gstDebug?: string }[] = [];

  constructor(private readonly codes: Record<string, number> = {}) {}

  async run(command: string, args: string[], env?: NodeJS.ProcessEnv): Promise<CommandResult> {
    this.calls.push({ command, args, gstDebug: env?.GST_DEBUG });
    const key = command === "sh" ? `sh ${args[1] ?? ""}` : command;
    return { code: this.codes[key] ?? 0, stdout: "", stderr: "" };
  }
}

describe("buildPipeline", () => {
  test("should chain decode, inference and overlay", () => {
    const argv = buildPipeline({ rtspUrl: "rtsp://127.0.0.1:8554/factorio", hefPath: "/models/yolo.hef" });

    expect(argv.join(" ")).toBe(
      "-v rtspsrc location=rtsp://127.0.0.1:8554/factorio protocols=tcp latency=100 ! " +
        "rtph264depay ! h264parse ! avdec_h264 ! videoconvert ! videoscale ! " +
        "video/x-raw,format=RGB,width=1280,height=720 ! hailonet hef-path=/models/yolo.hef ! " +
        "queue ! hailooverlay ! videoconvert ! autovideosink sync=false"
    );
  });

  test("should take decoder, sink and size overrides", () => {
    const argv = buildPipeline({
      rtspUrl: "rtsp://cam/feed",
      hefPath: "m.hef",
      decoder: "v4l2h264dec",
      sink: "fakesink",
      width: 640,
      height: 360,
    });

    expect(argv).toContain("v4l2h264dec");
    expect(argv).toContain("video/x-raw,format=RGB,width=640,height=360");
    expect(argv.slice(-2)).toEqual(["fakesink", "sync=false"]);
  });
});

describe("runPipeline", () => {
  let dir: string;
  let hef: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "hailo-"));
    hef = join(dir, "model.hef");
    await writeFile(hef, "");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("should exit 3 without gst-launch", async () => {
    const runner = new ScriptedRunner({ "sh command -v gst-launch-1.0": 1 });
    const run = runPipeline({ rtspUrl: "rtsp://cam/feed", hefPath: hef }, runner, runner);

    await expect(run).rejects.toBeInstanceOf(StreamPreflightError);
    await expect(run).rejects.toMatchObject({ exitCode: 3, message: "gst-launch-1.0 not found" });
  });

  test("should exit 4 without the hailonet plugin", async () => {
    const runner = new ScriptedRunner({ "gst-inspect-1.0": 1 });
    const run = runPipeline({ rtspUrl: "rtsp://cam/feed", hefPath: hef }, runner, runner);

    await expect(run).rejects.toMatchObject({ exitCode: 4 });
  });

  test("should exit 4 when gst-inspect-1.0 itself is missing", async () => {
    const runner: CommandRunner = {
      run: async (command, args) => {
        if (command === "gst-inspect-1.0") throw new Error("spawn gst-inspect-1.0 ENOENT");
        return new ScriptedRunner().run(command, args);
      },
    };
    const run = runPipeline({ rtspUrl: "rtsp://cam/feed", hefPath: hef }, runner, runner);

    await expect(run).rejects.toBeInstanceOf(StreamPreflightError);
    await expect(run).rejects.toMatchObject({
      exitCode: 4,
      message: "GStreamer 'hailonet' plugin not found (install HailoRT plugins)",
    });
  });

  test("should exit 2 when the model file is missing", async () => {
    const runner = new ScriptedRunner();
    const missing = join(dir, "missing.hef");
    const run = runPipeline({ rtspUrl: "rtsp://cam/feed", hefPath: missing }, runner, runner);

    await expect(run).rejects.toMatchObject({ exitCode: 2, message: `HEF not found at ${missing}` });
  });

  test("should launch the pipeline with GST_DEBUG set", async () => {
    const checks = new ScriptedRunner();
    const launcher = new ScriptedRunner({ "gst-launch-1.0": 130 });
    const previous = process.env.GST_DEBUG;
    delete process.env.GST_DEBUG;

    try {
      const code = await runPipeline({ rtspUrl: "rtsp://cam/feed", hefPath: hef }, checks, launcher);
      expect(code).toBe(130);
    } finally {
      if (previous !== undefined) process.env.GST_DEBUG = previous;
    }

    expect(checks.calls.map((c) => c.command)).toEqual(["sh", "gst-inspect-1.0"]);
    expect(launcher.calls).toHaveLength(1);
    expect(launcher.calls[0]?.command).toBe("gst-launch-1.0");
    expect(launcher.calls[0]?.gstDebug).toBe("1");
  });
});

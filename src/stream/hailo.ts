import { access } from "fs/promises";
import { type CommandRunner, commandExists, inheritRunner, spawnRunner } from "../utils/commands";

export class StreamPreflightError extends Error {
  constructor(message: string, readonly exitCode: number) {
    super(message);
    this.name = "StreamPreflightError";
  }
}

export interface PipelineOptions {
  rtspUrl: string;
  hefPath: string;
  // try v4l2h264dec where the hardware decoder is available
  decoder?: string;
  // fakesink when headless
  sink?: string;
  width?: number;
  height?: number;
}

/** gst-launch-1.0 argv: RTSP in, H.264 decode, Hailo inference, overlay, display. */
export function buildPipeline(options: PipelineOptions): string[] {
  const { rtspUrl, hefPath, decoder = "avdec_h264", sink = "autovideosink", width = 1280, height = 720 } = options;
  return [
    "-v",
    "rtspsrc", `location=${rtspUrl}`, "protocols=tcp", "latency=100", "!",
    "rtph264depay", "!", "h264parse", "!", decoder, "!",
    "videoconvert", "!", "videoscale", "!", `video/x-raw,format=RGB,width=${width},height=${height}`, "!",
    "hailonet", `hef-path=${hefPath}`, "!", "queue", "!", "hailooverlay", "!",
    "videoconvert", "!", sink, "sync=false",
  ];
}

export async function preflight(options: PipelineOptions, runner: CommandRunner = spawnRunner): Promise<void> {
  if (!(await commandExists("gst-launch-1.0", runner))) {
    throw new StreamPreflightError("gst-launch-1.0 not found", 3);
  }
  // a missing gst-inspect-1.0 means the plugin cannot be found either
  const hasPlugin = await runner.run("gst-inspect-1.0", ["hailonet"]).then(
    (result) => result.code === 0,
    () => false
  );
  if (!hasPlugin) {
    throw new StreamPreflightError("GStreamer 'hailonet' plugin not found (install HailoRT plugins)", 4);
  }
  try {
    await access(options.hefPath);
  } catch {
    throw new StreamPreflightError(`HEF not found at ${options.hefPath}`, 2);
  }
}

export async function runPipeline(
  options: PipelineOptions,
  runner: CommandRunner = spawnRunner,
  launcher: CommandRunner = inheritRunner
): Promise<number> {
  await preflight(options, runner);
  const env = { ...process.env, GST_DEBUG: process.env.GST_DEBUG || "1" };
  const result = await launcher.run("gst-launch-1.0", buildPipeline(options), env);
  return result.code;
}

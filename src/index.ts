#!/usr/bin/env node
/**
 * @fileoverview Main entry point for printlapse
 *
 * Runs one time-lapse session against a Duet printer: resolves the configuration,
 * guards against concurrent runs, checks the external programs, connects to the
 * printer, captures frames while the print runs and assembles them into a video.
 *
 * Key responsibilities:
 * - Parse command-line arguments and the optional JSON config file
 * - Take the instance lock, then configure the log sink (console, PrintLapse.log or both)
 * - Verify startup preconditions
 * - Detect the printer firmware generation
 * - Run the lifecycle state machine; SIGINT/SIGTERM request a graceful stop
 * - Optionally serve the control API
 * - Map the outcome onto the process exit code
 */

import { getConfigManager } from './managers/ConfigManager';
import type { RunConfig } from './types/config';
import { createCameraBackend } from './camera-backends';
import { ControlServer } from './control/server/ControlServer';
import { LifecycleStateMachine } from './services/LifecycleStateMachine';
import { detectPrinter } from './services/PrinterDetectionService';
import { ToolAvailabilityService } from './services/ToolAvailabilityService';
import { VideoAssemblyService } from './services/VideoAssemblyService';
import type { ReleaseLock } from './utils/InstanceLock';
import { EXIT_CODES, exitCodeForOutcome, exitCodeForStartupError, type ExitCode } from './utils/exit-codes';
import { toAppError } from './utils/error.utils';
import { closeLogSink, logError, logInfo, logWarning } from './utils/logging';
import { USAGE, parseRunArguments } from './utils/RunArguments';
import { claimSessionOutput, prepareScratchDirectory } from './utils/setup';

const MAIN_LOG_NAMESPACE = 'Main';

/**
 * Log the effective options once the log sink is in place
 */
function logOptions(config: Readonly<RunConfig>): void {
  logInfo(MAIN_LOG_NAMESPACE, 'Options:');
  logInfo(MAIN_LOG_NAMESPACE, `  duet=${config.duet} camera=${config.camera} detect=${config.detect}`);
  logInfo(
    MAIN_LOG_NAMESPACE,
    `  seconds=${config.seconds} pause=${config.pause ? 'yes' : 'no'} movehead=${
      config.moveHead ? `${config.moveHead.x},${config.moveHead.y}` : 'off'
    }`
  );
  logInfo(MAIN_LOG_NAMESPACE, `  basedir=${config.baseDir} extratime=${config.extraTime} instances=${config.instances}`);
  if (config.webUrl) {
    logInfo(MAIN_LOG_NAMESPACE, `  weburl=${config.webUrl}`);
  }
  if (config.cameraArgs.length > 0) {
    logInfo(MAIN_LOG_NAMESPACE, `  camparms=${config.cameraArgs.join(' ')}`);
  }
  if (config.videoArgs.length > 0) {
    logInfo(MAIN_LOG_NAMESPACE, `  vidparms=${config.videoArgs.join(' ')}`);
  }
}

/**
 * SIGINT/SIGTERM stop the session gracefully; the video is still created
 */
function setupSignalHandlers(session: LifecycleStateMachine): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    logInfo(MAIN_LOG_NAMESPACE, `Received ${signal}`);
    session.requestCancel();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

/**
 * Main application flow
 */
async function main(): Promise<ExitCode> {
  const args = parseRunArguments();

  if (args.help) {
    console.log(USAGE);
    return EXIT_CODES.OK;
  }
  if (args.errors.length > 0) {
    args.errors.forEach((error) => logError(MAIN_LOG_NAMESPACE, error));
    console.error(USAGE);
    return EXIT_CODES.STARTUP_FAILED;
  }

  let releaseLock: ReleaseLock = () => undefined;
  let session: LifecycleStateMachine;
  let config: Readonly<RunConfig>;
  const configManager = getConfigManager();

  try {
    // 1. Resolve configuration
    const fileValues = args.configFile ? configManager.loadFile(args.configFile) : {};
    const resolved = configManager.resolve(args.values, fileValues);
    config = resolved.config;

    // 2. Instance lock, then the log sink; console only until here
    releaseLock = claimSessionOutput(config);

    logOptions(config);
    resolved.warnings.forEach((warning) => logWarning(MAIN_LOG_NAMESPACE, warning));
    resolved.notes.forEach((note) => logInfo(MAIN_LOG_NAMESPACE, note));

    // 3. External programs
    await new ToolAvailabilityService().verify(config.camera);

    // 4. Printer
    const printer = await detectPrinter(config.duet);

    // 5. Frame directory
    prepareScratchDirectory(config.scratchDir);

    const camera = createCameraBackend(config);
    logInfo(MAIN_LOG_NAMESPACE, `Camera: ${camera.camera} (${camera.mode})`);

    session = new LifecycleStateMachine(
      {
        printer,
        camera,
        assembler: new VideoAssemblyService()
      },
      config
    );
  } catch (error) {
    const appError = toAppError(error);
    logError(MAIN_LOG_NAMESPACE, appError.message);
    if (appError.getUserMessage() !== appError.message) {
      logInfo(MAIN_LOG_NAMESPACE, appError.getUserMessage());
    }
    releaseLock();
    return exitCodeForStartupError(appError);
  }

  if (config.dontWait) {
    logInfo(MAIN_LOG_NAMESPACE, 'Capturing starts immediately (--dontwait)');
  } else {
    logInfo(MAIN_LOG_NAMESPACE, 'Waiting for the print to start...');
  }

  const removeSignalHandlers = setupSignalHandlers(session);
  const controlServer =
    config.controlPort === null ? null : new ControlServer({ session, printerHost: config.duet });

  try {
    if (controlServer && config.controlPort !== null) {
      try {
        await controlServer.start(config.controlPort);
      } catch (error) {
        // The session runs without remote control
        logWarning(MAIN_LOG_NAMESPACE, `Control server not started: ${toAppError(error).message}`);
      }
    }

    const outcome = await session.run();

    if (outcome.videoPath) {
      logInfo(MAIN_LOG_NAMESPACE, `Video: ${outcome.videoPath}`);
    }
    return exitCodeForOutcome(outcome);
  } finally {
    removeSignalHandlers();
    if (controlServer?.isRunning()) {
      await controlServer.stop().catch((error: unknown) => {
        logWarning(MAIN_LOG_NAMESPACE, `Control server did not stop cleanly: ${toAppError(error).message}`);
      });
    }
    releaseLock();
  }
}

main()
  .then((code) => {
    logInfo(MAIN_LOG_NAMESPACE, `Exiting with code ${code}`);
    closeLogSink();
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logError(MAIN_LOG_NAMESPACE, 'Fatal error:', error);
    closeLogSink();
    process.exitCode = EXIT_CODES.STARTUP_FAILED;
  });

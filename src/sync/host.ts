/**
 * Facade worker host.
 *
 * Runs a SessionOrchestrator on the worker's event loop and answers the
 * blocking facade's calls. Samples wait in small per-kind handoff queues
 * until the caller pulls them; a pull hands over the newest sample and
 * discards the rest.
 */

import type { Logger } from 'pino';
import type { Config } from '../core/config/schema.js';
import { ClosedError, NotConnectedError } from '../core/errors.js';
import type { DeviceEndpoint } from '../core/models/endpoint.js';
import { isSampleOf, type GazeSample, type Sample, type VideoSample } from '../core/models/samples.js';
import type { SensorKind } from '../core/models/sensors.js';
import { Discovery } from '../adapters/discovery/discovery.js';
import type { AdvertisementSourceFactory } from '../adapters/discovery/source.js';
import { OverlayMatcher, SceneAudioMatcher, type MatchedSceneAudioGaze } from '../orchestrator/matching.js';
import { SessionOrchestrator, type SessionOrchestratorOptions } from '../orchestrator/orchestrator.js';
import { SampleBuffer } from '../streams/buffer.js';
import type { CallRequest, MatchedSceneGaze } from './protocol.js';

// ============================================================================
// Host
// ============================================================================

interface SceneGazeFeed {
  matcher: OverlayMatcher<VideoSample<'scene'>, GazeSample>;
  frames: SampleBuffer<VideoSample<'scene'>>;
}

interface SceneAudioGazeFeed {
  matcher: SceneAudioMatcher;
  frames: SampleBuffer<VideoSample<'scene'>>;
}

export interface FacadeWorkerHostOptions {
  config: Config;
  logger: Logger;
  /** Stream and clock plumbing handed to the orchestrator */
  plumbing?: Pick<SessionOrchestratorOptions, 'transportFactory' | 'clockProbeFactory' | 'decoders'>;
  discoverySource?: AdvertisementSourceFactory;
}

export class FacadeWorkerHost {
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly plumbing: FacadeWorkerHostOptions['plumbing'];
  private readonly discoverySource: AdvertisementSourceFactory | undefined;
  private orchestrator: SessionOrchestrator | null = null;
  private readonly queues = new Map<SensorKind, SampleBuffer<Sample>>();
  private sceneGaze: SceneGazeFeed | null = null;
  private sceneAudioGaze: SceneAudioGazeFeed | null = null;
  private closed = false;

  constructor(options: FacadeWorkerHostOptions) {
    this.config = options.config;
    this.logger = options.logger.child({ module: 'facade-worker' });
    this.plumbing = options.plumbing;
    this.discoverySource = options.discoverySource;
  }

  /**
   * Run one call to completion and return its result.
   */
  async handle(request: CallRequest): Promise<unknown> {
    switch (request.method) {
      case 'connect':
        return this.connect(...request.args);
      case 'discover':
        return this.discover(...request.args);
      case 'close':
        this.close();
        return undefined;
      case 'status':
        return this.live().status();
      case 'recordingStart':
        return this.live().control.recordingStart();
      case 'recordingStopAndSave':
        return this.live().control.recordingStopAndSave();
      case 'recordingCancel':
        return this.live().control.recordingCancel();
      case 'sendEvent':
        return this.live().control.sendEvent(...request.args);
      case 'getTemplate':
        return this.live().control.getTemplate();
      case 'setTemplateData':
        return this.live().control.setTemplateData(...request.args);
      case 'getCalibration':
        return this.live().control.getCalibration();
      case 'estimateClockOffset':
        return this.live().estimateClockOffset();
      case 'requestSensor':
        this.live().requestSensor(...request.args);
        return undefined;
      case 'releaseSensor':
        this.releaseSensor(...request.args);
        return undefined;
      case 'receive':
        return this.receive(...request.args);
      case 'receiveMatchedSceneAndGaze':
        return this.receiveMatchedSceneAndGaze(...request.args);
      case 'receiveMatchedSceneAudioAndGaze':
        return this.receiveMatchedSceneAudioAndGaze(...request.args);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const queue of this.queues.values()) {
      queue.close();
    }
    this.queues.clear();
    this.sceneGaze?.frames.close();
    this.sceneAudioGaze?.frames.close();
    this.sceneGaze = null;
    this.sceneAudioGaze = null;

    this.orchestrator?.close();
    this.orchestrator = null;
  }

  // --------------------------------------------------------------------------
  // Connection
  // --------------------------------------------------------------------------

  private async connect(endpoint: DeviceEndpoint): Promise<void> {
    if (this.closed) {
      throw new ClosedError('Facade is closed');
    }
    if (this.orchestrator) return;

    const orchestrator = new SessionOrchestrator({
      ...this.plumbing,
      endpoint,
      config: this.config,
      logger: this.logger,
    });
    orchestrator.on('sample', ({ sample }) => {
      this.route(sample);
    });

    try {
      await orchestrator.start();
    } catch (error) {
      orchestrator.close();
      throw error;
    }
    this.orchestrator = orchestrator;
  }

  private async discover(all: boolean, timeoutMs: number): Promise<DeviceEndpoint[]> {
    const discovery = new Discovery({
      config: this.config.discovery,
      sourceFactory: this.discoverySource,
      logger: this.logger,
    });
    if (all) {
      return discovery.discoverAll(timeoutMs);
    }
    const endpoint = await discovery.discoverOne(timeoutMs);
    return endpoint ? [endpoint] : [];
  }

  private live(): SessionOrchestrator {
    if (this.closed) {
      throw new ClosedError('Facade is closed');
    }
    if (!this.orchestrator) {
      throw new NotConnectedError('Facade is not connected to a device');
    }
    return this.orchestrator;
  }

  // --------------------------------------------------------------------------
  // Sample Handoff
  // --------------------------------------------------------------------------

  private route(sample: Sample): void {
    this.queues.get(sample.kind)?.push(sample);

    if (isSampleOf(sample, 'scene')) {
      this.sceneGaze?.frames.push(sample);
      this.sceneAudioGaze?.frames.push(sample);
    } else if (isSampleOf(sample, 'gaze')) {
      this.sceneGaze?.matcher.pushSecondary(sample);
      this.sceneAudioGaze?.matcher.pushGaze(sample);
    } else if (isSampleOf(sample, 'audio')) {
      this.sceneAudioGaze?.matcher.pushAudio(sample);
    }
  }

  private releaseSensor(kind: SensorKind): void {
    const orchestrator = this.live();
    orchestrator.releaseSensor(kind);

    const queue = this.queues.get(kind);
    if (queue) {
      queue.close();
      this.queues.delete(kind);
    }
  }

  private queueFor(kind: SensorKind): SampleBuffer<Sample> {
    let queue = this.queues.get(kind);
    if (!queue) {
      queue = new SampleBuffer<Sample>(this.config.facade.queueCapacity, 'drop-oldest');
      this.queues.set(kind, queue);
    }
    return queue;
  }

  private async receive(kind: SensorKind, timeoutMs: number): Promise<Sample | null> {
    const orchestrator = this.live();
    const queue = this.queueFor(kind);
    orchestrator.requestSensor(kind);
    return queue.nextNewest(timeoutMs);
  }

  private async receiveMatchedSceneAndGaze(timeoutMs: number): Promise<MatchedSceneGaze | null> {
    const orchestrator = this.live();
    this.sceneGaze ??= {
      matcher: new OverlayMatcher<VideoSample<'scene'>, GazeSample>(),
      frames: new SampleBuffer<VideoSample<'scene'>>(this.config.facade.queueCapacity, 'drop-oldest'),
    };
    orchestrator.requestSensor('scene');
    orchestrator.requestSensor('gaze');

    const feed = this.sceneGaze;
    return matchWithin(timeoutMs, feed.frames, (frame) => feed.matcher.match(frame));
  }

  private async receiveMatchedSceneAudioAndGaze(timeoutMs: number): Promise<MatchedSceneAudioGaze | null> {
    const orchestrator = this.live();
    this.sceneAudioGaze ??= {
      matcher: new SceneAudioMatcher(),
      frames: new SampleBuffer<VideoSample<'scene'>>(this.config.facade.queueCapacity, 'drop-oldest'),
    };
    orchestrator.requestSensor('scene');
    orchestrator.requestSensor('gaze');
    orchestrator.requestSensor('audio');

    const feed = this.sceneAudioGaze;
    return matchWithin(timeoutMs, feed.frames, (frame) => feed.matcher.match(frame));
  }
}

/**
 * Pull frames until one can be matched or the time is up.
 */
async function matchWithin<F, R>(
  timeoutMs: number,
  frames: SampleBuffer<F>,
  match: (frame: F) => R | null
): Promise<R | null> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) return null;

    const frame = await frames.nextNewest(remaining);
    if (frame === null) return null;

    const matched = match(frame);
    if (matched) return matched;
  }
}

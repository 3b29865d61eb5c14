/**
 * gazecast
 *
 * Discovery, control and live sensor streaming for wearable eye trackers on
 * the local network.
 *
 * @module gazecast
 */

// Composition
export {
  connectDevice,
  connectFirstDevice,
  createContext,
  createDiscovery,
  type ClientContext,
  type ContextOptions,
  type OrchestratorPlumbing,
} from './app.js';

// Configuration and logging
export {
  ConfigSchema,
  defaultConfig,
  parseConfig,
  safeParseConfig,
  type Config,
  type ConfigInput,
  type ClockConfig,
  type ControlConfig,
  type DiscoveryConfig,
  type DropPolicy,
  type FacadeConfig,
  type LoggingConfig,
  type ReconnectConfig,
  type StreamsConfig,
} from './core/config/schema.js';
export { loadConfig } from './core/config/loader.js';
export { createLogger, silentLogger } from './core/logger.js';

// Errors
export {
  ClosedError,
  ConfigError,
  ConnectionError,
  DeviceClientError,
  DiscoveryError,
  NotConnectedError,
  NotFoundError,
  ProtocolError,
  RejectedError,
  TimeoutError,
  type ErrorCode,
} from './core/errors.js';

// Models
export { endpointFromHost, describeEndpoint, DEFAULT_CONTROL_PORT } from './core/models/endpoint.js';
export type { DeviceEndpoint, DeviceIdentity } from './core/models/endpoint.js';
export { SENSOR_KINDS, isSensorKind, isVideoSensorKind } from './core/models/sensors.js';
export type { SensorDescriptor, SensorKind, VideoSensorKind } from './core/models/sensors.js';
export { directSensor, isSensorAvailable } from './core/models/status.js';
export type {
  DeviceStatus,
  HardwareInfo,
  NetworkDeviceInfo,
  PhoneInfo,
  RecordingInfo,
  RecordingState,
  TemplateRef,
} from './core/models/status.js';
export { isSampleOf, nsToSeconds } from './core/models/samples.js';
export type {
  AudioChunk,
  AudioSample,
  EyeEvent,
  EyeEventSample,
  EyeState,
  Eyelid,
  GazePoint,
  GazeSample,
  ImuReading,
  ImuSample,
  Sample,
  SampleOf,
  TaggedSample,
  VideoFrame,
  VideoSample,
} from './core/models/samples.js';
export { parseCalibration, CALIBRATION_BYTES } from './core/models/calibration.js';
export type { Calibration, CameraCalibration } from './core/models/calibration.js';
export { missingRequiredItems } from './core/models/template.js';
export type { Template, TemplateData, TemplateDefinition, TemplateItem } from './core/models/template.js';

// Clock
export { ClockOffsetEstimator, UNKNOWN_OFFSET } from './core/clock/estimator.js';
export type { ClockOffset, ClockProbe, ClockProbeResult, OffsetConfidence } from './core/clock/estimator.js';
export { TimeEchoProbe } from './adapters/time-echo/probe.js';

// Discovery and control
export { Discovery, type DiscoveryOptions } from './adapters/discovery/discovery.js';
export type { AdvertisementRecord, AdvertisementSource, AdvertisementSourceFactory } from './adapters/discovery/source.js';
export { ControlSession, type ControlCommand, type ControlState } from './adapters/control/session.js';
export type { DeviceEvent } from './adapters/control/http.js';

// Streaming
export { StreamSession, type SampleClock, type StreamState } from './streams/session.js';
export { SampleBuffer } from './streams/buffer.js';
export { TransportPool } from './streams/transport.js';
export type { MediaTransport, MediaUnit, TrackInfo, TransportFactory } from './streams/transport.js';
export { rtspTransportFactory, RtspTransport } from './adapters/rtsp/transport.js';
export { createSampleDecoder } from './streams/decoders/index.js';
export type { AudioDecoder, DecoderOverrides, SampleDecoder, SampleStamp, VideoDecoder } from './streams/decoders/index.js';

// Orchestration
export {
  SessionOrchestrator,
  type ClockProbeFactory,
  type ConnectionEvent,
  type SessionOrchestratorOptions,
  type StreamStateEvent,
} from './orchestrator/orchestrator.js';
export {
  OverlayMatcher,
  SceneAudioMatcher,
  type MatchedPair,
  type MatchedSceneAudioGaze,
} from './orchestrator/matching.js';

// Blocking facade
export { SyncFacade, type SyncFacadeOptions } from './sync/facade.js';
export type { MatchedSceneGaze } from './sync/protocol.js';

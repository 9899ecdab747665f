/**
 * Engine channel
 *
 * The raw character stream to and from the engine process. Only the Session
 * touches a channel; everything else goes through Session.execute().
 */

export interface Disposable {
  dispose(): void;
}

export interface ChannelExit {
  exitCode: number;
  signal?: number;
}

export interface EngineChannel {
  readonly pid: number;
  write(data: string): void;
  onData(listener: (chunk: string) => void): Disposable;
  onExit(listener: (event: ChannelExit) => void): Disposable;
  kill(signal?: string): void;
}

export interface ChannelSpawnSpec {
  executable: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export type ChannelFactory = (spec: ChannelSpawnSpec) => Promise<EngineChannel>;

export interface HeadSink {
  write(chunk: Buffer | string): Promise<void>;
}

/**
 * Core media types shared by the resolver and the decoders
 */
import type { FileHandle } from 'node:fs/promises';
import type { Limits } from '../config/limits';
import type { FrameStream } from '../services/frames/FrameStream';

export enum MediaType {
  IMAGE = 'IMAGE',
  VIDEO = 'VIDEO',
}

/**
 * Stored media reference for a post
 */
export interface Post {
  id: number;
  type: MediaType;
  /** Filename of the primary file under the media root */
  image: string;
  /** Filename of the full-size variant under `full/` */
  fullsize?: string | null;
}

/**
 * One decoded picture, 3 channels in blue-green-red order
 */
export interface DecodedFrame {
  data: Buffer;
  width: number;
  height: number;
  channels: 3;
  channelOrder: 'bgr';
  /** Position in the sequence the frame came from */
  index: number;
  /** Seconds from the start of the video, when known */
  timestamp?: number;
  isKeyframe: boolean;
}

/**
 * An opened media file handed to a decoder
 */
export interface MediaSource {
  path: string;
  handle: FileHandle;
}

export interface MediaDecoder {
  decodeFrames(source: MediaSource, limits: Limits): FrameStream<DecodedFrame>;
}

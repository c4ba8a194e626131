import { checkRange } from "../../domain/validation/rules";
import { OrgScoped, defineOperation } from "../defineOperation";
import { StatusResponse } from "./shared";

export type Voice = {
  id: string;
  name: string;
  description?: string | null;
  public?: boolean;
  tags?: string[];
  language?: string;
  gender?: string;
};

export type VoiceList = {
  voices: Voice[];
};

export type VoiceListParams = OrgScoped;

export type VoiceIdParams = OrgScoped & {
  voiceId: string;
};

export type GenerateAudioSampleParams = OrgScoped & {
  text: string;
  voiceId?: string;
  language?: string;
  /** Playback rate, 0.5 to 2. */
  speed?: number;
  /** Semitones, -20 to 20. */
  pitch?: number;
  /** Audio container, e.g. "mp3" or "wav". */
  format?: string;
};

export type GenerateAudioSampleResponse = StatusResponse & {
  audio_url?: string;
  duration?: number;
};

export type PublishClonedVoiceParams = OrgScoped & {
  name: string;
  description: string;
  /** URLs of the recordings the voice is cloned from. */
  audioFiles: string[];
  language?: string;
  gender?: string;
};

export type PublishClonedVoiceResponse = StatusResponse & {
  voice_id?: string;
};

export const listVoices = defineOperation<VoiceListParams, VoiceList>()({
  name: "listVoices",
  method: "GET",
  endpoint: "voices",
  orgHeader: "encrypted_key"
});

export const getVoiceDetails = defineOperation<VoiceIdParams, Voice>()({
  name: "getVoiceDetails",
  method: "GET",
  endpoint: "voiceDetails",
  orgHeader: "encrypted_key",
  required: { voiceId: "voice_id" },
  path: { voice_id: "voiceId" }
});

export const generateAudioSample = defineOperation<GenerateAudioSampleParams, GenerateAudioSampleResponse>()({
  name: "generateAudioSample",
  method: "POST",
  endpoint: "generateAudio",
  orgHeader: "encrypted_key",
  required: { text: "text" },
  prepare(p) {
    checkRange(p.speed, "speed");
    checkRange(p.pitch, "pitch");
    return p;
  },
  body: (p) => ({
    text: p.text,
    voice_id: p.voiceId || undefined,
    language: p.language || undefined,
    speed: p.speed,
    pitch: p.pitch,
    format: p.format || undefined
  })
});

export const publishClonedVoice = defineOperation<PublishClonedVoiceParams, PublishClonedVoiceResponse>()({
  name: "publishClonedVoice",
  method: "POST",
  endpoint: "publishVoice",
  orgHeader: "encrypted_key",
  required: { name: "name", description: "description", audioFiles: "audio_files" },
  body: (p) => ({
    name: p.name,
    description: p.description,
    audio_files: p.audioFiles,
    language: p.language || undefined,
    gender: p.gender || undefined
  })
});

import { describe, expect, test } from "vitest";
import { clientConfigFromEnv, loadEnv } from "../../../config";
import { buildRequest } from "../../buildRequest";
import { generateAudioSample, getVoiceDetails, listVoices, publishClonedVoice } from "../voices";

const config = clientConfigFromEnv(loadEnv({}));
const auth = { authToken: "test-secret" };

describe("voices", () => {
  test("listVoices and getVoiceDetails", () => {
    expect(buildRequest(listVoices, auth, config).url).toBe("https://api.bland.ai/v1/voices");
    expect(buildRequest(getVoiceDetails, { ...auth, voiceId: "mason" }, config).url).toBe(
      "https://api.bland.ai/v1/voices/mason"
    );
  });

  test("generateAudioSample", () => {
    const req = buildRequest(
      generateAudioSample,
      { ...auth, text: "Hello there", voiceId: "mason", speed: 1.25, pitch: -3, format: "mp3" },
      config
    );
    expect(req.url).toBe("https://api.bland.ai/v1/voices/generate");
    expect(req.body).toEqual({ text: "Hello there", voice_id: "mason", speed: 1.25, pitch: -3, format: "mp3" });
  });

  test("generateAudioSample checks speed and pitch", () => {
    expect(() => buildRequest(generateAudioSample, { ...auth, text: "Hi", speed: 0.4 }, config)).toThrow(
      "speed must be between 0.5 and 2"
    );
    expect(() => buildRequest(generateAudioSample, { ...auth, text: "Hi", pitch: 21 }, config)).toThrow(
      "pitch must be between -20 and 20"
    );
  });

  test("publishClonedVoice requires recordings", () => {
    expect(() =>
      buildRequest(publishClonedVoice, { ...auth, name: "Ava", description: "Warm", audioFiles: [] }, config)
    ).toThrow("Missing required parameter: audio_files");

    const req = buildRequest(
      publishClonedVoice,
      { ...auth, name: "Ava", description: "Warm", audioFiles: ["https://files.example.com/a.wav"], gender: "female" },
      config
    );
    expect(req.body).toEqual({
      name: "Ava",
      description: "Warm",
      audio_files: ["https://files.example.com/a.wav"],
      gender: "female"
    });
  });
});

/** One discovered Whisper export; optional files are absent from the directory */
export interface WhisperModelInfo {
  name: string;
  directory: string;
  encoderPath: string;
  decoderPath: string;
  tokenizerPath: string;
  preprocessorConfigPath?: string;
  configPath?: string;
  generationConfigPath?: string;
}

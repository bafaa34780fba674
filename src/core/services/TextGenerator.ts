export interface TextGenerator {
  // Human-readable model id, used in log lines
  readonly model: string;
  // Send one prompt and return the model's text reply
  generate(prompt: string): Promise<string>;
}

export enum PromptType {
  Input = "input",
  Confirm = "confirm",
}

export enum LogLevel {
  Debug = "debug",
  Info = "info",
  Error = "error",
}

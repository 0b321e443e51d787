export {
  STDIN_NAME,
  STDOUT_NAME,
  PWD_NAME,
  processStdio,
  inputName,
  outputName,
  resolveDir,
  dirName,
  openInput,
  openOutput,
  readLines,
  copyInput,
  type StdioStreams,
  type InputSource,
  type OutputTarget,
} from "./stdio.js";

// Per-file switches for logWithTimestamp. Files not listed fall back to `default`.
// Set SOLIDVALUE_DEBUG=1 to turn everything on.

const loggingConfig: { [file: string]: boolean } = {
  default: process.env.SOLIDVALUE_DEBUG === '1',
  // 'chain': true,
  // 'SolidValueToken': true,
}

export default loggingConfig

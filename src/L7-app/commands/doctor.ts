import { spawnCommand } from '../../L1-infra/process/process.js'
import { fileExistsSync } from '../../L1-infra/fileSystem/fileSystem.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import { nearestExistingDir } from '../../L1-infra/paths/paths.js'
import { resolveToolLocations } from '../../L3-services/diagnostics/diagnostics.js'
import type { ToolLocation } from '../../L3-services/diagnostics/diagnostics.js'

export interface CheckResult {
  label: string
  ok: boolean
  required: boolean
  message: string
}

export function parseVersionFromOutput(output: string): string {
  const match = output.match(/(\d+\.\d+(?:\.\d+)?)/)
  return match ? match[1] : 'unknown'
}

function getFFmpegInstallHint(): string {
  const platform = process.platform
  const lines = ['Install FFmpeg:']
  if (platform === 'win32') {
    lines.push('  winget install Gyan.FFmpeg')
  } else if (platform === 'darwin') {
    lines.push('  brew install ffmpeg')
  } else {
    lines.push('  sudo apt install ffmpeg     (Debian/Ubuntu)')
    lines.push('  sudo dnf install ffmpeg     (Fedora)')
  }
  lines.push('  Or set FFMPEG_PATH / FFPROBE_PATH to a custom binary location')
  return lines.join('\n          ')
}

export function checkNode(version: string = process.version): CheckResult {
  const major = parseInt(version.slice(1), 10)
  const ok = major >= 20
  return {
    label: 'Node.js',
    ok,
    required: true,
    message: ok
      ? `Node.js ${version} (required: ≥20)`
      : `Node.js ${version} — version ≥20 required`,
  }
}

function checkVersionedBinary(label: string, location: ToolLocation, versionFlag: string, hint: string): CheckResult {
  const result = spawnCommand(location.command, [versionFlag], { timeout: 10_000 })
  if (!result.error && result.status === 0) {
    const ver = parseVersionFromOutput(`${result.stdout}${result.stderr}`)
    return { label, ok: true, required: true, message: `${label} ${ver} (source: ${location.source})` }
  }
  return { label, ok: false, required: true, message: `${label} not found at "${location.command}" — ${hint}` }
}

function checkSuperResolution(): CheckResult {
  const { superResolution } = resolveToolLocations()
  const launcher = checkVersionedBinary('Real-ESRGAN launcher', superResolution, '--version', `set REALESRGAN_COMMAND`)
  if (!launcher.ok) return launcher
  const found = fileExistsSync(superResolution.script)
  return {
    label: 'Real-ESRGAN',
    ok: found,
    required: true,
    message: found
      ? `Real-ESRGAN script ${superResolution.script} (launcher: ${superResolution.command}, source: ${superResolution.source})`
      : `Real-ESRGAN script not found: ${superResolution.script} — set REALESRGAN_SCRIPT`,
  }
}

function checkInterpolation(): CheckResult {
  const { interpolation } = resolveToolLocations()
  // RIFE has no version flag; -h prints usage and the spawn itself is the check.
  const result = spawnCommand(interpolation.command, ['-h'], { timeout: 10_000 })
  if (!result.error) {
    return { label: 'RIFE', ok: true, required: true, message: `RIFE ${interpolation.command} (source: ${interpolation.source})` }
  }
  return {
    label: 'RIFE',
    ok: false,
    required: true,
    message: `RIFE not found at "${interpolation.command}" — set RIFE_PATH to the rife-ncnn-vulkan binary`,
  }
}

function checkDirectory(label: string, dir: string): CheckResult {
  const exists = fileExistsSync(dir)
  return {
    label,
    ok: exists,
    required: false,
    message: exists
      ? `${label} exists: ${dir}`
      : `${label} will be created: ${dir} (on ${nearestExistingDir(dir)})`,
  }
}

export function runChecks(): CheckResult[] {
  const tools = resolveToolLocations()
  const config = getConfig()
  return [
    checkNode(),
    checkVersionedBinary('FFmpeg', tools.ffmpeg, '-version', getFFmpegInstallHint()),
    checkVersionedBinary('FFprobe', tools.ffprobe, '-version', `usually included with FFmpeg.\n          ${getFFmpegInstallHint()}`),
    checkSuperResolution(),
    checkInterpolation(),
    checkDirectory('Working directory', config.WORK_DIR),
    checkDirectory('Output directory', config.OUTPUT_DIR),
  ]
}

/** Print every check; resolves to the exit code (1 when a required tool is missing). */
export function runDoctor(): number {
  console.log('\n🔍 reelforge doctor — Checking prerequisites...\n')

  const results = runChecks()
  for (const r of results) {
    const icon = r.ok ? '✅' : r.required ? '❌' : '⬚'
    console.log(`  ${icon} ${r.message}`)
  }

  const failedRequired = results.filter((r) => r.required && !r.ok)
  console.log()
  if (failedRequired.length === 0) {
    console.log('  All required checks passed! ✅\n')
    return 0
  }
  console.log(`  ${failedRequired.length} required check${failedRequired.length === 1 ? '' : 's'} failed ❌\n`)
  return 1
}

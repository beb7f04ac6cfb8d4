const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  '\'': '&apos;',
}

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, char => XML_ESCAPES[char] ?? char)
}

/**
 * Formats a keyframe time between 0 and 1.
 * The bounds are written as `0` and `1`, anything else with up to
 * six decimals and no trailing zeros.
 */
export function formatKeyTime(time: number): string {
  if (time === 0)
    return '0'
  if (time === 1)
    return '1'
  return time.toFixed(6).replace(/0+$/, '').replace(/\.$/, '')
}

/** Splits one animation cycle into `frameCount` equal slots, closing boundary included */
export function keyTimes(frameCount: number): string {
  return Array.from({ length: frameCount + 1 }, (_, i) => formatKeyTime(i / frameCount)).join(';')
}

/** Opacity per keyframe for the frame shown in slot `frameIndex` */
export function opacityValues(frameIndex: number, frameCount: number): string {
  return Array.from({ length: frameCount + 1 }, (_, i) => (i === frameIndex ? '1' : '0')).join(';')
}

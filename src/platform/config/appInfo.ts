export interface AppInfo {
  productName: string
  releaseVersion: string
}

export const appInfo: AppInfo = {
  productName: 'grustnogram-client',
  releaseVersion: '0.1.0',
}

export function defaultUserAgent(): string {
  return `${appInfo.productName}/${appInfo.releaseVersion}`
}

export { Header } from './Header.tsx';
export { UploadProgress } from './UploadProgress.tsx';
export { ConnectionStatus, type ConnectionStep } from './ConnectionStatus.tsx';
export { ShellLog } from './ShellLog.tsx';
export { LogWarnings } from './LogWarnings.tsx';
export { UploadApp } from './UploadApp.tsx';
export { ShellApp } from './ShellApp.tsx';

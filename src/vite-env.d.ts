declare const __BUILD_ID__: string | undefined;
declare const __API_BASE__: string | undefined;

declare module '*.css';

export const SCRIPT_WRITER_TOKEN = 'SCRIPT_WRITER';

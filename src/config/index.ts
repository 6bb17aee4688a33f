import dotenv from 'dotenv';
dotenv.config();

interface Config {
  port: number;
  nodeEnv: string;
  version: string;
  maxFileSize: number;
}

export const config: Config = {
  port: parseInt(process.env.PORT || '5000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  version: process.env.npm_package_version || '1.0.0',
  maxFileSize: parseInt(process.env.MAX_FILE_SIZE || '52428800', 10),
};

export default config;

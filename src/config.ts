// Environment configuration for the default AWS client
export const config = {
  aws: {
    region: process.env.AWS_REGION || 'us-east-1'
  }
} as const;

import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // pdf.js loads its worker from node_modules at run time
  serverExternalPackages: ['pdfjs-dist'],
};

export default nextConfig;

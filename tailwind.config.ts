import type { Config } from 'tailwindcss';

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  darkMode: 'class',
  theme: {
    extend: {
      colors: {
        accent: {
          DEFAULT: '#4361ee',
          dark: '#7b8cff',
        },
      },
    },
  },
  plugins: [],
} satisfies Config;
